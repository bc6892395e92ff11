import { execFile } from "child_process";

export type CommandResult =
  | { kind: "exited"; exitCode: number; stdout: string; stderr: string }
  | { kind: "not_found" }
  | { kind: "timeout" }
  | { kind: "failed"; message: string };

export type CommandOptions = {
  timeoutMs: number;
};

export type CommandRunner = (command: string, args: string[], options: CommandOptions) => Promise<CommandResult>;

const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

/**
 * Run a binary without a shell and resolve with a tagged result. Never rejects;
 * the child is killed once `timeoutMs` elapses.
 */
export const runCommand: CommandRunner = (command, args, { timeoutMs }) => new Promise( (resolve) => {
  execFile(
    command,
    args,
    { timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, encoding: "utf8", windowsHide: true },
    (error, stdout, stderr) => {
      if ( !error ) {
        resolve( { kind: "exited", exitCode: 0, stdout, stderr } );
        return;
      }
      if ( error.code === "ENOENT" ) {
        resolve( { kind: "not_found" } );
        return;
      }
      if ( error.code === "ERR_CHILD_PROCESS_STDIO_MAXBUFFER" ) {
        resolve( { kind: "failed", message: "output exceeded buffer" } );
        return;
      }
      if ( error.killed ) {
        resolve( { kind: "timeout" } );
        return;
      }
      if ( typeof error.code === "number" ) {
        resolve( { kind: "exited", exitCode: error.code, stdout, stderr } );
        return;
      }
      resolve( { kind: "failed", message: error.message } );
    },
  );
} );
