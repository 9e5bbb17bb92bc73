import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { Agent, searchTermFromTask } from './Agent';
import { extractJsonObject, jsonOutput, textOutput } from './output';
import { SchemaValidationError } from '../../errors';
import { FakeSearchTool, ScriptedInference, silentLogger } from '../../test/fakes';

const summarySchema = z.object({ title: z.string(), points: z.array(z.string()) });
const summaryOutput = jsonOutput('Summary', '{"title": string, "points": string[]}', summarySchema);

describe('Agent', () => {
  it('builds instructions, context, task and schema instruction in order', async () => {
    const agent = new Agent({
      logger: silentLogger,
      name: 'Test Agent',
      instructions: 'Summarize things.',
      inference: new ScriptedInference(),
      output: summaryOutput,
    });

    const messages = await agent.buildMessages('Summarize the meeting', { attendees: 3 });

    expect(messages).toEqual([
      { role: 'system', content: 'Summarize things.' },
      { role: 'user', content: 'Context: {"attendees":3}' },
      { role: 'user', content: 'Summarize the meeting' },
      {
        role: 'system',
        content: 'You must respond with valid JSON matching this schema: {"title": string, "points": string[]}',
      },
    ]);
  });

  it('searches for the marked term and adds the results as a system message', async () => {
    const tool = new FakeSearchTool([{ title: 'T', url: 'https://example.com', snippet: 'S', content: 'C' }]);
    const agent = new Agent({
      logger: silentLogger,
      name: 'Search Agent',
      instructions: 'Summarize search results.',
      inference: new ScriptedInference(),
      output: textOutput,
      searchTool: tool,
    });

    const messages = await agent.buildMessages('Search term: heat pumps\nReason for searching: Compare costs');

    expect(tool.queries).toEqual([{ query: 'heat pumps', numResults: 3 }]);
    expect(messages).toHaveLength(3);
    expect(messages[2].role).toBe('system');
    expect(messages[2].content).toBe(
      'Search results:\n' +
        JSON.stringify([{ title: 'T', url: 'https://example.com', snippet: 'S', content: 'C' }], null, 2)
    );
  });

  it('skips the results message when the search finds nothing', async () => {
    const agent = new Agent({
      logger: silentLogger,
      name: 'Search Agent',
      instructions: 'i',
      inference: new ScriptedInference(),
      output: textOutput,
      searchTool: new FakeSearchTool([]),
    });
    expect(await agent.buildMessages('Search term: nothing')).toHaveLength(2);
  });

  it('returns parsed structured output with usage and a trace id', async () => {
    const inference = new ScriptedInference(['Here you go: {"title": "Q3", "points": ["up", "down"]}']);
    const agent = new Agent({ logger: silentLogger, name: 'A', instructions: 'i', inference, output: summaryOutput });

    const result = await agent.run('task');

    expect(result.finalOutput).toEqual({ title: 'Q3', points: ['up', 'down'] });
    expect(result.usage.total_tokens).toBe(20);
    expect(result.traceId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('forwards model settings to inference', async () => {
    const inference = new ScriptedInference(['text']);
    const agent = new Agent({
      logger: silentLogger,
      name: 'A',
      instructions: 'i',
      inference,
      output: textOutput,
      model: 'm',
      settings: { temperature: 0.5, maxTokens: 200 },
    });

    await agent.run('task');
    expect(inference.calls[0].options).toEqual({ model: 'm', temperature: 0.5, maxTokens: 200, topP: undefined });
  });

  it('propagates a schema failure as SchemaValidationError with issues', async () => {
    const inference = new ScriptedInference(['{"title": 7}']);
    const agent = new Agent({ logger: silentLogger, name: 'A', instructions: 'i', inference, output: summaryOutput });

    const error = await agent.run('task').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SchemaValidationError);
    if (error instanceof SchemaValidationError) {
      expect(error.outputName).toBe('Summary');
      expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['title', 'points']);
    }
  });

  it('rejects malformed JSON between braces', async () => {
    const inference = new ScriptedInference(['{"title": "x", points: }']);
    const agent = new Agent({ logger: silentLogger, name: 'A', instructions: 'i', inference, output: summaryOutput });
    await expect(agent.run('task')).rejects.toThrow(/^Summary: response is not valid JSON/);
  });
});

describe('searchTermFromTask', () => {
  it('takes the text after the marker up to the end of the line', () => {
    expect(searchTermFromTask('Search term: solar subsidies\nReason for searching: x')).toBe('solar subsidies');
  });

  it('uses the last marker when there are several', () => {
    expect(searchTermFromTask('Search term: a\nSearch term: b')).toBe('b');
  });

  it('falls back to the first line without a marker', () => {
    expect(searchTermFromTask('plain task\nsecond line')).toBe('plain task');
  });

  it('falls back to the first 100 characters when the term is empty', () => {
    const task = 'Search term:\n' + 'y'.repeat(150);
    expect(searchTermFromTask(task)).toBe(task.slice(0, 100));
  });
});

describe('extractJsonObject', () => {
  it('returns the outermost object span', () => {
    expect(extractJsonObject('prefix {"a": {"b": 1}} suffix')).toBe('{"a": {"b": 1}}');
  });

  it('returns null without a complete object', () => {
    expect(extractJsonObject('no json here')).toBeNull();
    expect(extractJsonObject('} backwards {')).toBeNull();
  });
});
