import { spawn } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { Readable, Writable } from "node:stream";
import { SpawnError } from "../shared/errors.js";

/**
 * The part of a child process the supervisor relies on. `ChildProcessWithoutNullStreams`
 * satisfies it; tests provide an in-process stand-in.
 */
export interface SpawnedProcess extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface SpawnRequest {
  command: string;
  args: readonly string[];
  cwd?: string;
  env: NodeJS.ProcessEnv;
}

export type SpawnProcess = (request: SpawnRequest) => SpawnedProcess;

export const spawnWithPipes: SpawnProcess = ({ command, args, cwd, env }) =>
  spawn(command, [...args], {
    cwd: cwd ?? process.cwd(),
    stdio: ["pipe", "pipe", "pipe"],
    env,
  });

/** Resolve once the OS has started the process; reject with SpawnError if it never does. */
export function waitForSpawn(child: SpawnedProcess, command: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onSpawn = () => {
      child.off("error", onError);
      resolve();
    };
    const onError = (err: Error) => {
      child.off("spawn", onSpawn);
      reject(new SpawnError(`Failed to start ${command}: ${err.message}`, { cause: err }));
    };
    child.once("spawn", onSpawn);
    child.once("error", onError);
  });
}
