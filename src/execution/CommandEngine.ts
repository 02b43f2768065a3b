import { buildArguments } from "./ArgumentBuilder";
import { ExecutionSupervisor, type CancelOutcome, type ExecutionSummary } from "./ExecutionSupervisor";
import { OutputStreamer } from "./OutputStreamer";
import { describePlatform, detectPlatform, resolveCatalog, resolveTemplate, type PlatformDescription } from "../platform/PlatformResolver";
import type { Catalog, CommandTemplate, PlatformClass, ToolParams, ToolView } from "../tools/ToolTypes";
import { logger as rootLogger, type Logger } from "../logging/logger";

export interface StartedExecution {
  /** Present only when a process launch was attempted. */
  executionId?: string;
  lines: AsyncIterable<string>;
}

export interface CommandEngineOptions {
  loadCatalog: () => Catalog;
  supervisor?: ExecutionSupervisor;
  platform?: PlatformClass;
  logger?: Logger;
}

async function* singleLine(line: string): AsyncGenerator<string, void, undefined> {
  yield line;
}

function toView(template: CommandTemplate, platform: PlatformClass): ToolView | undefined {
  const variant = template.variants[platform];
  if (!variant) return undefined;
  return {
    id: template.id,
    name: template.name ?? template.id,
    description: template.description,
    platform,
    base: variant.base,
    target: template.targetOptionId,
    options: template.options.map(o => ({
      id: o.id,
      label: o.label,
      type: o.type,
      inputType: o.inputType,
      required: o.required,
      placeholder: o.placeholder,
    })),
  };
}

export class CommandEngine {
  readonly supervisor: ExecutionSupervisor;
  readonly platform: PlatformClass;
  private readonly streamer: OutputStreamer;
  private readonly loadCatalog: () => Catalog;
  private readonly log: Logger;

  constructor(opts: CommandEngineOptions) {
    this.loadCatalog = opts.loadCatalog;
    this.supervisor = opts.supervisor ?? new ExecutionSupervisor({ logger: opts.logger });
    this.platform = opts.platform ?? detectPlatform();
    this.streamer = new OutputStreamer(this.supervisor);
    this.log = (opts.logger ?? rootLogger).child({ component: "engine" });
  }

  /** Tools runnable on this platform. Catalog load failures propagate. */
  listTools(): ToolView[] {
    const resolved = resolveCatalog(this.loadCatalog(), this.platform);
    return Object.values(resolved)
      .map(t => toView(t, this.platform))
      .filter((v): v is ToolView => v !== undefined);
  }

  startExecution(toolId: string, params: ToolParams): StartedExecution {
    let catalog: Catalog;
    try {
      catalog = this.loadCatalog();
    } catch (e) {
      this.log.error({ err: e, toolId }, "catalog load failed");
      return { lines: singleLine(`Error: ${e instanceof Error ? e.message : String(e)}`) };
    }

    const template = Object.prototype.hasOwnProperty.call(catalog, toolId) ? catalog[toolId] : undefined;
    if (!template) return { lines: singleLine(`Command not found: ${toolId}`) };
    const resolved = resolveTemplate(template, this.platform);
    const variant = resolved?.variants[this.platform];
    if (!resolved || !variant) return { lines: singleLine(`Command not supported on this system: ${toolId}`) };

    const built = buildArguments(resolved, variant, params, this.platform);
    if (!built.ok) {
      this.log.info({ toolId, missingOption: built.error.missingOption }, "execution rejected");
      return { lines: singleLine(`Error: ${built.error.message}`) };
    }

    const execution = this.supervisor.launch(built.argv);
    return { executionId: execution.id, lines: this.streamer.stream(execution) };
  }

  cancelExecution(executionId: string): CancelOutcome {
    return this.supervisor.cancel(executionId);
  }

  listExecutions(): ExecutionSummary[] {
    return this.supervisor.list();
  }

  describePlatform(): PlatformDescription {
    return describePlatform();
  }
}
