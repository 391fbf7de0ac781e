import { spawn } from "node:child_process";
import { HttpRouteError } from "../../domain/http-route-error.js";
import { logEvent } from "../../logging/logger.js";

export type GitExecResult = {
  stdout: string;
  stderr: string;
  stdoutBuffer: Buffer;
  exitCode: number;
};

export type GitExecOptions = {
  cwd?: string;
  allowExitCodes?: number[];
  signal?: AbortSignal;
};

export type GitReadOptions = Pick<GitExecOptions, "signal">;

export class GitCommandError extends Error {
  readonly args: string[];
  readonly cwd: string;
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;

  constructor(
    args: string[],
    cwd: string,
    exitCode: number,
    stdout: string,
    stderr: string,
  ) {
    super(`git ${args.join(" ")} failed with exit code ${exitCode}`);
    this.name = "GitCommandError";
    this.args = args;
    this.cwd = cwd;
    this.exitCode = exitCode;
    this.stdout = stdout;
    this.stderr = stderr;
  }
}

type GitCommandSummary = {
  subcommand: string;
  flagCount: number;
  positionalCount: number;
  usesRepoOverride: boolean;
};

export function summarizeGitCommandArgs(args: string[]): GitCommandSummary {
  const tokens: string[] = [];
  let usesRepoOverride = false;

  for (let index = 0; index < args.length; index += 1) {
    const token = args[index];

    if (!token) {
      continue;
    }

    if (token === "-C") {
      usesRepoOverride = true;
      index += 1;
      continue;
    }

    tokens.push(token);
  }

  const subcommandIndex = tokens.findIndex((token) => !token.startsWith("-"));
  const subcommand = tokens[subcommandIndex] ?? "unknown";
  const flagCount = tokens.filter((token) => token.startsWith("-")).length;
  const positionalCount =
    subcommandIndex >= 0
      ? tokens.slice(subcommandIndex + 1).filter((token) => !token.startsWith("-")).length
      : 0;

  return {
    subcommand,
    flagCount,
    positionalCount,
    usesRepoOverride,
  };
}

function elapsedMs(startedAt: bigint): number {
  return Number((Number(process.hrtime.bigint() - startedAt) / 1_000_000).toFixed(1));
}

function collectChunks(stream: NodeJS.ReadableStream, chunks: Buffer[]): void {
  stream.on("data", (chunk: Buffer | string) => {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  });
}

// Resolves for any exit code in allowExitCodes; an aborted signal kills the child and rejects.
export async function execGit(
  args: string[],
  options: GitExecOptions = {},
): Promise<GitExecResult> {
  const allowExitCodes = options.allowExitCodes ?? [0];
  const cwd = options.cwd ?? process.cwd();
  const command = summarizeGitCommandArgs(args);
  const startedAt = process.hrtime.bigint();

  logEvent("git", "debug", "git:spawn", { command, cwd, allowExitCodes });

  return await new Promise((resolve, reject) => {
    const child = spawn("git", args, { cwd, signal: options.signal });
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];

    collectChunks(child.stdout, stdoutChunks);
    collectChunks(child.stderr, stderrChunks);

    child.on("error", (error) => {
      const aborted = error.name === "AbortError";

      logEvent("git", aborted ? "info" : "error", aborted ? "git:aborted" : "git:spawn-error", {
        command,
        cwd,
        durationMs: elapsedMs(startedAt),
        message: error.message,
      });

      reject(new GitCommandError(args, cwd, -1, "", error.message));
    });

    child.on("close", (code) => {
      const exitCode = code ?? -1;
      const stdoutBuffer = Buffer.concat(stdoutChunks);
      const stderr = Buffer.concat(stderrChunks).toString("utf8");
      const allowed = allowExitCodes.includes(exitCode);

      logEvent("git", allowed ? "debug" : "warn", "git:exit", {
        command,
        exitCode,
        durationMs: elapsedMs(startedAt),
        stdoutBytes: stdoutBuffer.length,
      });

      if (!allowed) {
        reject(new GitCommandError(args, cwd, exitCode, stdoutBuffer.toString("utf8"), stderr));
        return;
      }

      resolve({ stdout: stdoutBuffer.toString("utf8"), stderr, stdoutBuffer, exitCode });
    });
  });
}

function gitErrorDetails(error: GitCommandError): Record<string, string | number | null> {
  return {
    command: `git ${error.args.join(" ")}`,
    cwd: error.cwd,
    exitCode: error.exitCode,
    stderr: error.stderr.trim() || null,
  };
}

export function toGitRouteError(error: unknown, message: string, status = 500): HttpRouteError {
  if (error instanceof HttpRouteError) return error;

  if (error instanceof GitCommandError) {
    return new HttpRouteError(status, "GIT_COMMAND_FAILED", message, {
      details: gitErrorDetails(error),
      cause: error,
    });
  }

  return new HttpRouteError(500, "INTERNAL_ERROR", message, { cause: error });
}
