#!/usr/bin/env node
import { runGitviewCli } from "./run.js";

await runGitviewCli(process.argv.slice(2));
