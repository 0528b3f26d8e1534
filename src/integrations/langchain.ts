import type { Logger } from 'pino';
import { EventType } from '../domain/index.js';
import type { EventSink } from '../application/instrument.js';

/**
 * Shapes of the LangChain.js callback arguments this handler reads.
 * Typed structurally so the SDK does not depend on `@langchain/core`.
 */
export interface SerializedRunnable {
  name?: string | undefined;
  id?: readonly string[] | undefined;
  [key: string]: unknown;
}

export interface LLMGeneration {
  text?: string | undefined;
  [key: string]: unknown;
}

export interface LLMResultLike {
  generations: readonly (readonly LLMGeneration[])[];
  llmOutput?: Record<string, unknown> | undefined;
}

interface RunStart {
  serialized: SerializedRunnable;
  tags: readonly string[];
  prompts?: readonly string[];
  input?: string;
  inputs?: Record<string, unknown>;
}

/**
 * Callback handler for LangChain.js runs.
 *
 * Start callbacks are remembered by run id; the matching end or error
 * callback emits one event:
 *
 * - LLM runs → `llm_invoke` named `llm_<model>`
 * - tool runs → `tool_call` named after the tool
 * - chain runs → `decision` named `chain_<name>`
 *
 * ```ts
 * const handler = new BeaconCallbackHandler(client);
 * await chain.invoke(input, { callbacks: [handler] });
 * ```
 */
export class BeaconCallbackHandler {
  readonly name = 'BeaconCallbackHandler';
  private readonly sink: EventSink;
  private readonly log: Logger | undefined;
  private readonly runs = new Map<string, RunStart>();

  constructor(sink: EventSink, options: { log?: Logger | undefined } = {}) {
    this.sink = sink;
    this.log = options.log;
  }

  /** Runs that started but have not ended yet. */
  get openRuns(): number {
    return this.runs.size;
  }

  handleLLMStart(
    llm: SerializedRunnable,
    prompts: readonly string[],
    runId: string,
    _parentRunId?: string,
    _extraParams?: Record<string, unknown>,
    tags?: readonly string[],
  ): void {
    this.runs.set(runId, { serialized: llm, prompts, tags: tags ?? [] });
  }

  handleLLMEnd(output: LLMResultLike, runId: string, parentRunId?: string): void {
    const start = this.take(runId);
    const model = runnableName(start?.serialized, 'unknown');
    const generations = output.generations.flatMap((list) =>
      list.map((generation) => generation.text ?? JSON.stringify(generation)),
    );

    this.emit({
      type: EventType.LLM_INVOKE,
      name: `llm_${model}`,
      payload: { prompts: start?.prompts ?? [], generations, model },
      metadata: { ...runMetadata(runId, parentRunId, start), llm_output: output.llmOutput ?? {} },
    });
  }

  handleLLMError(error: unknown, runId: string, parentRunId?: string): void {
    const start = this.take(runId);
    const model = runnableName(start?.serialized, 'unknown');

    this.emit({
      type: EventType.LLM_INVOKE,
      name: `llm_${model}`,
      payload: { prompts: start?.prompts ?? [], model, error: describeError(error) },
      metadata: { ...runMetadata(runId, parentRunId, start), success: false },
    });
  }

  handleToolStart(
    tool: SerializedRunnable,
    input: string,
    runId: string,
    _parentRunId?: string,
    tags?: readonly string[],
  ): void {
    this.runs.set(runId, { serialized: tool, input, tags: tags ?? [] });
  }

  handleToolEnd(output: unknown, runId: string, parentRunId?: string): void {
    const start = this.take(runId);

    this.emit({
      type: EventType.TOOL_CALL,
      name: start?.serialized.name ?? 'unknown_tool',
      payload: { input: start?.input ?? '', output },
      metadata: runMetadata(runId, parentRunId, start),
    });
  }

  handleToolError(error: unknown, runId: string, parentRunId?: string): void {
    const start = this.take(runId);

    this.emit({
      type: EventType.TOOL_CALL,
      name: start?.serialized.name ?? 'unknown_tool',
      payload: { input: start?.input ?? '', error: describeError(error) },
      metadata: { ...runMetadata(runId, parentRunId, start), success: false },
    });
  }

  handleChainStart(
    chain: SerializedRunnable,
    inputs: Record<string, unknown>,
    runId: string,
    _parentRunId?: string,
    tags?: readonly string[],
  ): void {
    this.runs.set(runId, { serialized: chain, inputs, tags: tags ?? [] });
  }

  handleChainEnd(outputs: Record<string, unknown>, runId: string, parentRunId?: string): void {
    const start = this.take(runId);

    this.emit({
      type: EventType.DECISION,
      name: `chain_${runnableName(start?.serialized, 'unknown_chain')}`,
      payload: { inputs: start?.inputs ?? {}, outputs },
      metadata: runMetadata(runId, parentRunId, start),
    });
  }

  handleChainError(error: unknown, runId: string, parentRunId?: string): void {
    const start = this.take(runId);

    this.emit({
      type: EventType.DECISION,
      name: `chain_${runnableName(start?.serialized, 'unknown_chain')}`,
      payload: { inputs: start?.inputs ?? {}, error: describeError(error) },
      metadata: { ...runMetadata(runId, parentRunId, start), success: false },
    });
  }

  private take(runId: string): RunStart | undefined {
    const start = this.runs.get(runId);
    this.runs.delete(runId);
    if (start === undefined) {
      this.log?.debug({ run_id: runId }, 'Run ended without a recorded start');
    }
    return start;
  }

  // Callback errors must not break the host chain.
  private emit(event: Parameters<EventSink['track']>[0]): void {
    try {
      this.sink.track(event);
    } catch (err: unknown) {
      this.log?.warn({ err }, 'Failed to track LangChain run');
    }
  }
}

function runnableName(serialized: SerializedRunnable | undefined, fallback: string): string {
  if (serialized === undefined) return fallback;
  if (serialized.name) return serialized.name;
  const path = serialized.id ?? [];
  return path[path.length - 1] ?? fallback;
}

function runMetadata(runId: string, parentRunId: string | undefined, start: RunStart | undefined): Record<string, unknown> {
  return {
    run_id: runId,
    parent_run_id: parentRunId ?? null,
    tags: start?.tags ?? [],
  };
}

function describeError(error: unknown): { type: string; message: string } {
  if (error instanceof Error) {
    return { type: error.name, message: error.message };
  }
  return { type: typeof error, message: String(error) };
}
