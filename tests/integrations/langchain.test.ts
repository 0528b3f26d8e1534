import { describe, it, expect, vi, beforeEach } from 'vitest';
import { BeaconCallbackHandler } from '../../src/integrations/langchain.js';
import { fakeLogger } from '../helpers.js';

describe('BeaconCallbackHandler', () => {
  let sink: { track: ReturnType<typeof vi.fn> };
  let handler: BeaconCallbackHandler;

  beforeEach(() => {
    sink = { track: vi.fn() };
    handler = new BeaconCallbackHandler(sink);
  });

  it('reports an LLM run when it ends', () => {
    handler.handleLLMStart({ name: 'gpt-test' }, ['What is AI?'], 'run-1', undefined, undefined, ['prod']);
    expect(sink.track).not.toHaveBeenCalled();

    handler.handleLLMEnd({ generations: [[{ text: 'Artificial intelligence.' }]] }, 'run-1', 'parent-1');

    expect(sink.track).toHaveBeenCalledWith({
      type: 'llm_invoke',
      name: 'llm_gpt-test',
      payload: { prompts: ['What is AI?'], generations: ['Artificial intelligence.'], model: 'gpt-test' },
      metadata: { run_id: 'run-1', parent_run_id: 'parent-1', tags: ['prod'], llm_output: {} },
    });
    expect(handler.openRuns).toBe(0);
  });

  it('reports a failed LLM run', () => {
    handler.handleLLMStart({ name: 'gpt-test' }, ['test prompt'], 'run-2');

    handler.handleLLMError(new Error('rate limit exceeded'), 'run-2');

    expect(sink.track).toHaveBeenCalledWith({
      type: 'llm_invoke',
      name: 'llm_gpt-test',
      payload: { prompts: ['test prompt'], model: 'gpt-test', error: { type: 'Error', message: 'rate limit exceeded' } },
      metadata: { run_id: 'run-2', parent_run_id: null, tags: [], success: false },
    });
  });

  it('reports tool runs by tool name', () => {
    handler.handleToolStart({ name: 'calculator' }, '2+2', 'run-3');
    handler.handleToolEnd('4', 'run-3');

    expect(sink.track).toHaveBeenCalledWith({
      type: 'tool_call',
      name: 'calculator',
      payload: { input: '2+2', output: '4' },
      metadata: { run_id: 'run-3', parent_run_id: null, tags: [] },
    });
  });

  it('falls back to a generic name when the start was never seen', () => {
    const log = fakeLogger();
    handler = new BeaconCallbackHandler(sink, { log });

    handler.handleToolError(new RangeError('bad input'), 'run-unknown');

    expect(sink.track).toHaveBeenCalledWith({
      type: 'tool_call',
      name: 'unknown_tool',
      payload: { input: '', error: { type: 'RangeError', message: 'bad input' } },
      metadata: { run_id: 'run-unknown', parent_run_id: null, tags: [], success: false },
    });
    expect(log.debug).toHaveBeenCalledWith({ run_id: 'run-unknown' }, 'Run ended without a recorded start');
  });

  it('names chains after the last segment of their id', () => {
    handler.handleChainStart({ id: ['langchain', 'chains', 'RetrievalQA'] }, { question: 'why?' }, 'run-4', undefined, ['qa']);
    handler.handleChainEnd({ answer: 'because' }, 'run-4');

    expect(sink.track).toHaveBeenCalledWith({
      type: 'decision',
      name: 'chain_RetrievalQA',
      payload: { inputs: { question: 'why?' }, outputs: { answer: 'because' } },
      metadata: { run_id: 'run-4', parent_run_id: null, tags: ['qa'] },
    });
  });

  it('reports a failed chain', () => {
    handler.handleChainStart({}, { question: 'why?' }, 'run-5');
    handler.handleChainError('timeout', 'run-5');

    expect(sink.track).toHaveBeenCalledWith(
      expect.objectContaining({
        name: 'chain_unknown_chain',
        payload: { inputs: { question: 'why?' }, error: { type: 'string', message: 'timeout' } },
      }),
    );
  });

  it('keeps runs apart by id', () => {
    handler.handleToolStart({ name: 'a' }, 'in-a', 'run-a');
    handler.handleToolStart({ name: 'b' }, 'in-b', 'run-b');
    expect(handler.openRuns).toBe(2);

    handler.handleToolEnd('out-b', 'run-b');

    expect(sink.track).toHaveBeenCalledWith(expect.objectContaining({ name: 'b', payload: { input: 'in-b', output: 'out-b' } }));
    expect(handler.openRuns).toBe(1);
  });

  it('does not let a failing sink break the run', () => {
    const log = fakeLogger();
    sink.track.mockImplementation(() => {
      throw new Error('sink down');
    });
    handler = new BeaconCallbackHandler(sink, { log });
    handler.handleToolStart({ name: 'a' }, 'x', 'run-6');

    expect(() => handler.handleToolEnd('y', 'run-6')).not.toThrow();
    expect(log.warn).toHaveBeenCalledWith(expect.objectContaining({ err: expect.any(Error) }), 'Failed to track LangChain run');
  });
});
