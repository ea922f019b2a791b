import { spawn } from "node:child_process";

export interface RunProcessOptions {
  timeout?: number; // Kill the process after this many milliseconds
  signal?: AbortSignal;
  cwd?: string;
}

export interface ProcessOutput {
  stdout: string;
  stderr: string;
}

export class ProcessTimeoutError extends Error {
  name = "TimeoutError";
}

/**
 * Run an external command to completion
 *
 * Rejects with the spawn error (ENOENT when the command is missing, an
 * AbortError when the signal fires), a TimeoutError when the timeout killed
 * it, or an Error carrying stderr on a non-zero exit.
 */
export function runProcess(
  command: string,
  args: string[],
  options: RunProcessOptions = {},
): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      signal: options.signal,
      timeout: options.timeout,
      stdio: ["ignore", "pipe", "pipe"],
    });

    let stdout = "";
    let stderr = "";

    child.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    child.on("error", (error) => {
      reject(error);
    });

    child.on("close", (code, signal) => {
      if (code === 0) {
        resolve({ stdout, stderr });
      } else if (signal !== null && options.timeout && !options.signal?.aborted) {
        reject(
          new ProcessTimeoutError(
            `${command} timed out after ${options.timeout}ms`,
          ),
        );
      } else {
        reject(
          new Error(
            `${command} exited with ${code ?? signal}${stderr ? `\n${stderr.trim()}` : ""}`,
          ),
        );
      }
    });
  });
}
