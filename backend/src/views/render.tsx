// Server-side rendering entry; flow is route handler -> render*Page(data) -> HTML document string.
import type { ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import type {
  BlobViewData,
  CommitsViewData,
  DiffViewData,
  OverviewViewData,
  TreeViewData,
  WorkflowsViewData,
} from "@gitview/contracts";
import { BlobPage } from "./BlobPage.js";
import { CommitsPage } from "./CommitsPage.js";
import { DiffPage } from "./DiffPage.js";
import { OverviewPage } from "./OverviewPage.js";
import { TreePage } from "./TreePage.js";
import { WorkflowsPage } from "./WorkflowsPage.js";

export function renderDocument(element: ReactElement): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(element)}`;
}

export function renderOverviewPage(data: OverviewViewData): string {
  return renderDocument(<OverviewPage data={data} />);
}

export function renderTreePage(data: TreeViewData): string {
  return renderDocument(<TreePage data={data} />);
}

export function renderBlobPage(data: BlobViewData): string {
  return renderDocument(<BlobPage data={data} />);
}

export function renderCommitsPage(data: CommitsViewData): string {
  return renderDocument(<CommitsPage data={data} />);
}

export function renderDiffPage(data: DiffViewData): string {
  return renderDocument(<DiffPage data={data} />);
}

export function renderWorkflowsPage(data: WorkflowsViewData): string {
  return renderDocument(<WorkflowsPage data={data} />);
}
