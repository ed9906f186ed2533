/**
 * Child process plumbing for installers and build steps.
 *
 * Commands run in exec form (no shell) with an explicit environment, so the
 * host's variables reach a child only when listed in HOST_TOOL_VARS.
 */

import { spawn } from "child_process";

export interface CommandOptions {
  cwd: string;
  env: Record<string, string>;
  signal?: AbortSignal;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/** Runs a command to completion. Rejects only when it cannot be started or is aborted. */
export type CommandRunner = (command: readonly string[], options: CommandOptions) => Promise<CommandResult>;

/** Host variables package managers and compilers need to find themselves. */
const HOST_TOOL_VARS = [
  "PATH",
  "HOME",
  "USERPROFILE",
  "SystemRoot",
  "TMPDIR",
  "TEMP",
  "TMP",
  "LANG",
  "npm_config_cache",
  "PIP_CACHE_DIR",
];

const MAX_CAPTURE = 64 * 1024;

export function hostToolEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {};
  for (const key of HOST_TOOL_VARS) {
    const value = source[key];
    if (value !== undefined) env[key] = value;
  }
  return env;
}

/** Keep the last `max` characters of captured output. */
export function tail(text: string, max = 4000): string {
  return text.length > max ? `...${text.slice(text.length - max)}` : text;
}

export const runCommand: CommandRunner = (command, options) =>
  new Promise<CommandResult>((resolve, reject) => {
    const [file, ...args] = command;
    if (!file) {
      reject(new Error("Empty command"));
      return;
    }

    const child = spawn(file, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: ["ignore", "pipe", "pipe"],
      signal: options.signal,
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";
    child.stdout.setEncoding("utf-8");
    child.stderr.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      stdout = (stdout + chunk).slice(-MAX_CAPTURE);
    });
    child.stderr.on("data", (chunk: string) => {
      stderr = (stderr + chunk).slice(-MAX_CAPTURE);
    });

    child.on("error", (error) => {
      reject(options.signal?.aborted ? options.signal.reason : error);
    });
    child.on("close", (code, signalName) => {
      if (options.signal?.aborted) {
        reject(options.signal.reason);
        return;
      }
      resolve({
        exitCode: code ?? (signalName ? 128 : 1),
        stdout,
        stderr,
      });
    });
  });
