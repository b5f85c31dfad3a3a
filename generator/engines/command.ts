/**
 * Subprocess execution for command-line image tools
 */

import { spawn } from "node:child_process";

export interface CommandResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
  error?: string;
}

export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;

/**
 * Run a command without a shell and wait for it to exit
 */
export const runCommand: CommandRunner = (command, args) =>
  new Promise((resolve) => {
    let stdout = "";
    let stderr = "";

    const proc = spawn(command, args);

    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on("close", (code) => {
      resolve({
        success: code === 0,
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode: code ?? 1,
      });
    });

    proc.on("error", (err) => {
      resolve({
        success: false,
        stdout,
        stderr,
        exitCode: 1,
        error: err.message,
      });
    });
  });

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}
