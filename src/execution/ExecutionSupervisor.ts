import { spawn, type SpawnOptions } from "child_process";
import crypto from "crypto";
import readline from "readline";
import type { Readable } from "stream";
import { logger as rootLogger, type Logger } from "../logging/logger";
import { ExecutionRegistry } from "./ExecutionRegistry";
import { LineChannel } from "./LineChannel";
import { DEFAULT_CHANNEL_CAPACITY } from "../config/Config";

/** The slice of `ChildProcess` the supervisor relies on. */
export interface ChildHandle {
  readonly pid?: number | undefined;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  on(event: "error", listener: (err: Error) => void): this;
  once(event: "spawn", listener: () => void): this;
  once(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
}

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

export type ExecutionState =
  | { kind: "running" }
  | { kind: "cancelled" }
  | { kind: "completed"; exitCode: number | null; signal: NodeJS.Signals | null }
  | { kind: "failed"; error: string };

type TerminalState = Exclude<ExecutionState, { kind: "running" }>;

export type SpawnOutcome = { ok: true } | { ok: false; error: string };

export type CancelOutcome =
  | { status: "stopped" }
  | { status: "not_found" }
  | { status: "error"; error: string };

export interface ExecutionSummary {
  id: string;
  argv: string[];
  pid?: number;
  startedAt: string;
}

interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export class Execution {
  readonly startedAt = new Date().toISOString();
  pid?: number;
  private current: ExecutionState = { kind: "running" };
  private readonly spawnSignal = deferred<SpawnOutcome>();
  private readonly exitSignal = deferred<void>();

  constructor(readonly id: string, readonly argv: readonly string[], readonly channel: LineChannel) {}

  get state(): ExecutionState {
    return this.current;
  }

  /** Resolves once the OS has started the process or refused to. */
  get spawned(): Promise<SpawnOutcome> {
    return this.spawnSignal.promise;
  }

  /** Resolves once the process has exited and its pipes are closed. */
  get exited(): Promise<void> {
    return this.exitSignal.promise;
  }

  settle(next: TerminalState): boolean {
    if (this.current.kind !== "running") return false;
    this.current = next;
    return true;
  }

  markSpawned(outcome: SpawnOutcome): void {
    this.spawnSignal.resolve(outcome);
  }

  markExited(): void {
    this.exitSignal.resolve();
  }

  summary(): ExecutionSummary {
    return { id: this.id, argv: [...this.argv], pid: this.pid, startedAt: this.startedAt };
  }
}

export interface ActiveExecution {
  execution: Execution;
  child: ChildHandle;
}

export interface ExecutionSupervisorOptions {
  registry?: ExecutionRegistry<ActiveExecution>;
  spawnFn?: SpawnFn;
  channelCapacity?: number;
  killSignal?: NodeJS.Signals;
  cwd?: string;
  /** Run tools with stderr sharing stdout's pipe. Defaults to on everywhere but Windows. */
  mergeOutput?: boolean;
  logger?: Logger;
}

const defaultSpawn: SpawnFn = (command, args, options) => spawn(command, args, options);

export const MERGE_OUTPUT_SHELL = "/bin/sh";

/**
 * Checks that the tool can be found, then swaps the shell's stderr for stdout and
 * execs the tool in its place. The command line arrives as positional parameters,
 * so nothing in it is ever parsed by the shell.
 */
export const MERGE_OUTPUT_SCRIPT =
  'command -v "$1" >/dev/null 2>&1 || { printf \'spawn %s ENOENT\\n\' "$1" >&2; exit 127; }; exec 2>&1; exec "$@"';

export function mergeOutputArgs(argv: readonly string[]): string[] {
  return ["-c", MERGE_OUTPUT_SCRIPT, "sh", ...argv];
}

export class ExecutionSupervisor {
  readonly registry: ExecutionRegistry<ActiveExecution>;
  private readonly spawnFn: SpawnFn;
  private readonly channelCapacity: number;
  private readonly killSignal: NodeJS.Signals;
  private readonly cwd?: string;
  private readonly mergeOutput: boolean;
  private readonly log: Logger;

  constructor(opts: ExecutionSupervisorOptions = {}) {
    this.registry = opts.registry ?? new ExecutionRegistry<ActiveExecution>();
    this.spawnFn = opts.spawnFn ?? defaultSpawn;
    this.channelCapacity = opts.channelCapacity ?? DEFAULT_CHANNEL_CAPACITY;
    this.killSignal = opts.killSignal ?? "SIGTERM";
    this.cwd = opts.cwd;
    this.mergeOutput = opts.mergeOutput ?? process.platform !== "win32";
    this.log = (opts.logger ?? rootLogger).child({ component: "supervisor" });
  }

  /**
   * Starts `argv` and returns its execution straight away. The execution is
   * registered only when the process has actually spawned; a spawn failure ends
   * it in the `failed` state without ever touching the registry.
   *
   * With `mergeOutput` the tool runs under `MERGE_OUTPUT_SHELL`, which points its
   * stderr at stdout so both share one pipe and keep the order they were written
   * in. The wrapper's own stderr then only carries launch status: it closes empty
   * right before the `exec`, or holds the reason the tool could not be started.
   */
  launch(argv: readonly string[]): Execution {
    const readers: readline.Interface[] = [];
    const channel = new LineChannel(this.channelCapacity, {
      onFull: () => readers.forEach(r => r.pause()),
      onDrain: () => readers.forEach(r => r.resume()),
    });
    const execution = new Execution(crypto.randomUUID(), [...argv], channel);
    if (argv.length === 0) {
      this.failToSpawn(execution, "empty command line");
      return execution;
    }

    const [command, ...args] = this.mergeOutput ? [MERGE_OUTPUT_SHELL, ...mergeOutputArgs(argv)] : argv;
    const child = this.trySpawn(execution, command, args);
    if (!child) return execution;

    let started = false;
    const start = () => {
      if (started || execution.state.kind !== "running") return;
      started = true;
      execution.pid = child.pid;
      this.registry.insert(execution.id, { execution, child });
      execution.markSpawned({ ok: true });
      this.log.info({ executionId: execution.id, pid: child.pid, argv }, "execution started");
    };

    const launchStatus = this.mergeOutput ? child.stderr : null;
    child.once("spawn", () => {
      if (!launchStatus) start();
    });
    if (launchStatus) this.watchLaunchStatus(execution, launchStatus, start);
    child.on("error", err => {
      if (!started) {
        this.failToSpawn(execution, err.message);
        return;
      }
      this.log.warn({ executionId: execution.id, err }, "child process error");
    });
    child.once("close", (exitCode, signal) => {
      if (this.registry.remove(execution.id)) {
        execution.settle({ kind: "completed", exitCode, signal });
        this.log.info({ executionId: execution.id, exitCode, signal }, "execution finished");
      }
      channel.close();
      execution.markExited();
    });

    const outputs = launchStatus ? [child.stdout] : [child.stdout, child.stderr];
    const streams = outputs.filter((s): s is Readable => s !== null);
    let open = streams.length;
    if (open === 0) channel.close();
    for (const stream of streams) {
      stream.on("error", err => this.failRunning(execution, child, err));
      const reader = readline.createInterface({ input: stream, crlfDelay: Infinity });
      // readline re-emits input errors on the interface
      reader.on("error", err => this.failRunning(execution, child, err));
      readers.push(reader);
      reader.on("line", line => channel.push(line));
      reader.once("close", () => {
        open -= 1;
        if (open === 0) channel.close();
      });
    }
    return execution;
  }

  cancel(id: string): CancelOutcome {
    const active = this.registry.get(id);
    if (!active) return { status: "not_found" };
    const { execution, child } = active;
    let delivered: boolean;
    try {
      delivered = child.kill(this.killSignal);
    } catch (e) {
      this.log.warn({ executionId: id, err: e }, "termination signal failed");
      return { status: "error", error: errorMessage(e) };
    }
    if (!delivered) {
      this.log.warn({ executionId: id, pid: child.pid }, "termination signal not delivered");
      return { status: "error", error: `could not deliver ${this.killSignal} to pid ${child.pid ?? "?"}` };
    }
    this.registry.remove(id);
    execution.settle({ kind: "cancelled" });
    execution.channel.close();
    this.log.info({ executionId: id, signal: this.killSignal }, "execution cancelled");
    return { status: "stopped" };
  }

  /** Cancels every active execution, e.g. on shutdown. */
  cancelAll(): Record<string, CancelOutcome> {
    const outcomes: Record<string, CancelOutcome> = {};
    for (const { execution } of this.registry.values()) outcomes[execution.id] = this.cancel(execution.id);
    return outcomes;
  }

  list(): ExecutionSummary[] {
    return this.registry.values().map(a => a.execution.summary());
  }

  private trySpawn(execution: Execution, command: string, args: string[]): ChildHandle | undefined {
    try {
      return this.spawnFn(command, args, {
        cwd: this.cwd,
        stdio: ["ignore", "pipe", "pipe"],
        windowsHide: true,
      });
    } catch (e) {
      this.failToSpawn(execution, errorMessage(e));
      return undefined;
    }
  }

  private watchLaunchStatus(execution: Execution, status: Readable, start: () => void): void {
    let diagnostic = "";
    status.setEncoding("utf8");
    status.on("data", (chunk: string) => {
      diagnostic += chunk;
    });
    status.on("error", err => this.failToSpawn(execution, err.message));
    status.once("end", () => {
      const reason = diagnostic.trim();
      if (reason) this.failToSpawn(execution, reason);
      else start();
    });
  }

  private failToSpawn(execution: Execution, error: string): void {
    if (!execution.settle({ kind: "failed", error })) return;
    execution.channel.close();
    execution.markSpawned({ ok: false, error });
    execution.markExited();
    this.log.error({ executionId: execution.id, argv: execution.argv, error }, "spawn failed");
  }

  private failRunning(execution: Execution, child: ChildHandle, err: Error): void {
    if (!this.registry.remove(execution.id)) return;
    execution.settle({ kind: "failed", error: err.message });
    execution.channel.close();
    this.log.error({ executionId: execution.id, err }, "output stream failed");
    try {
      child.kill(this.killSignal);
    } catch (e) {
      this.log.warn({ executionId: execution.id, err: e }, "termination signal failed");
    }
  }
}
