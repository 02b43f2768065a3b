import type { Execution, ExecutionState, ExecutionSupervisor } from "./ExecutionSupervisor";

export const INTERRUPTED_LINE = "Execution interrupted";

function trailer(state: ExecutionState): string {
  switch (state.kind) {
    case "cancelled":
      return INTERRUPTED_LINE;
    case "failed":
      return `Error: ${state.error}`;
    case "completed":
      if (state.exitCode === null && state.signal) return `Process finished with signal: ${state.signal}`;
      return `Process finished with exit code: ${state.exitCode}`;
    case "running":
      return "Error: execution ended without an exit status";
  }
}

export class OutputStreamer {
  constructor(private readonly supervisor: ExecutionSupervisor) {}

  /**
   * Lines of one execution: command line and id, then the process output as it
   * arrives, then one closing line. Each execution can be streamed once; a consumer
   * that stops early cancels the run.
   */
  async *stream(execution: Execution): AsyncGenerator<string, void, undefined> {
    if (!execution.channel.claim()) {
      yield `Error: output of execution ${execution.id} is already being streamed`;
      return;
    }
    try {
      const spawned = await execution.spawned;
      if (!spawned.ok) {
        yield `Error: ${spawned.error}`;
        return;
      }
      yield `Executing: ${execution.argv.join(" ")}`;
      yield `Execution ID: ${execution.id}`;

      for await (const line of execution.channel) {
        if (execution.state.kind === "cancelled") {
          yield INTERRUPTED_LINE;
          return;
        }
        yield line;
      }

      const ended = execution.state;
      if (ended.kind === "running" || ended.kind === "completed") await execution.exited;
      yield trailer(execution.state);
    } finally {
      if (execution.state.kind === "running") this.supervisor.cancel(execution.id);
    }
  }
}
