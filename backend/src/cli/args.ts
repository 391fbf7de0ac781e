import path from "node:path";
import { DEFAULT_PAGES_BRANCH } from "../services/pages/pages-resolver.js";

export type GitviewCliOptions = {
  repoRoot: string;
  port: number;
  host: string;
  pagesBranch: string;
  openBrowser: boolean;
};

export type GitviewCliParseResult =
  | {
      kind: "help";
      message: string;
    }
  | {
      kind: "run";
      options: GitviewCliOptions;
    };

export class GitviewCliArgsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GitviewCliArgsError";
  }
}

const DEFAULT_PORT = 8080;
const DEFAULT_HOST = "127.0.0.1";
const MIN_PORT = 1;
const MAX_PORT = 65535;

export function formatHelp(binaryName = "gitview"): string {
  return [
    "gitview: browse a local Git repository in the browser",
    "",
    "Usage:",
    `  ${binaryName} [repoPath] [--port <number>] [--host <host>] [--addr <[host]:port>] [--pages-branch <name>] [--open]`,
    "",
    "Examples:",
    `  ${binaryName}`,
    `  ${binaryName} ~/dev/my-repo`,
    `  ${binaryName} --addr :9000`,
    `  ${binaryName} --port 4000 --host 0.0.0.0 --pages-branch docs`,
    "",
    "Options:",
    `  -p, --port <number>          Server port (default: ${DEFAULT_PORT})`,
    `      --host <host>            Host interface (default: ${DEFAULT_HOST})`,
    "      --addr <[host]:port>     Listen address, e.g. :8080 or 0.0.0.0:9000",
    `      --pages-branch <name>    Default branch for /pages/ (default: ${DEFAULT_PAGES_BRANCH})`,
    "      --open                   Open the browser once the server is listening",
    "  -h, --help                   Show help",
  ].join("\n");
}

function parsePort(raw: string): number {
  const parsed = Number(raw);

  if (!Number.isInteger(parsed) || parsed < MIN_PORT || parsed > MAX_PORT) {
    throw new GitviewCliArgsError(`Invalid port: ${raw}. Use an integer between ${MIN_PORT}-${MAX_PORT}.`);
  }

  return parsed;
}

function requireValue(flag: string, next: string | undefined): string {
  if (!next || next.startsWith("-")) {
    throw new GitviewCliArgsError(`Missing value for ${flag}.`);
  }

  return next;
}

function parseAddr(raw: string): { host: string | null; port: number } {
  const separatorIndex = raw.lastIndexOf(":");

  if (separatorIndex < 0) {
    throw new GitviewCliArgsError(`Invalid address: ${raw}. Use [host]:port, e.g. :8080.`);
  }

  const rawHost = raw.slice(0, separatorIndex).replace(/^\[(.*)\]$/, "$1");

  return {
    host: rawHost.trim() ? rawHost : null,
    port: parsePort(raw.slice(separatorIndex + 1)),
  };
}

function requireNonEmpty(flag: string, value: string): string {
  if (!value.trim()) {
    throw new GitviewCliArgsError(`Value for ${flag} cannot be empty.`);
  }

  return value;
}

export function parseGitviewCliArgs(argv: string[], cwd = process.cwd()): GitviewCliParseResult {
  let port = DEFAULT_PORT;
  let host = DEFAULT_HOST;
  let pagesBranch = DEFAULT_PAGES_BRANCH;
  let openBrowser = false;
  let repoPath: string | null = null;

  const applyAddr = (raw: string) => {
    const addr = parseAddr(raw);
    port = addr.port;
    host = addr.host ?? host;
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];

    if (token === undefined) {
      continue;
    }

    if (token === "-h" || token === "--help") {
      return {
        kind: "help",
        message: formatHelp(),
      };
    }

    if (token === "--open") {
      openBrowser = true;
      continue;
    }

    if (token === "-p" || token === "--port") {
      const value = requireValue(token, argv[index + 1]);
      port = parsePort(value);
      index += 1;
      continue;
    }

    if (token.startsWith("--port=")) {
      port = parsePort(token.slice("--port=".length));
      continue;
    }

    if (token === "--host") {
      host = requireValue(token, argv[index + 1]);
      index += 1;
      continue;
    }

    if (token.startsWith("--host=")) {
      host = requireNonEmpty("--host", token.slice("--host=".length));
      continue;
    }

    if (token === "--addr") {
      applyAddr(requireValue(token, argv[index + 1]));
      index += 1;
      continue;
    }

    if (token.startsWith("--addr=")) {
      applyAddr(token.slice("--addr=".length));
      continue;
    }

    if (token === "--pages-branch") {
      pagesBranch = requireValue(token, argv[index + 1]);
      index += 1;
      continue;
    }

    if (token.startsWith("--pages-branch=")) {
      pagesBranch = requireNonEmpty("--pages-branch", token.slice("--pages-branch=".length));
      continue;
    }

    if (token.startsWith("-")) {
      throw new GitviewCliArgsError(`Unknown flag: ${token}`);
    }

    if (repoPath !== null) {
      throw new GitviewCliArgsError("Only one repository path can be provided.");
    }

    repoPath = token;
  }

  return {
    kind: "run",
    options: {
      repoRoot: path.resolve(cwd, repoPath ?? "."),
      port,
      host,
      pagesBranch,
      openBrowser,
    },
  };
}
