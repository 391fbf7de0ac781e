export { hasBranch, listBranches } from "./git/branches.service.js";
export { readBlob, toRevisionSpec } from "./git/content.service.js";
export { getDiff } from "./git/diff.service.js";
export { getHead } from "./git/head.service.js";
export { getLog } from "./git/log.service.js";
export { loadRepoContext } from "./git/repo-context.service.js";
export { listTree } from "./git/tree.service.js";
export { listWorkflows } from "./git/workflows.service.js";
