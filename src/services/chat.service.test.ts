import { describe, it, expect, beforeEach } from 'vitest';
import { ChatService } from './chat.service';
import { InMemoryConversationStore } from './store/InMemoryConversationStore';
import { ScriptedInference, silentLogger } from '../test/fakes';
import type { Message } from '../models/chat.model';

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('ChatService', () => {
  let store: InMemoryConversationStore;
  let inference: ScriptedInference;
  let service: ChatService;

  beforeEach(() => {
    store = new InMemoryConversationStore();
    inference = new ScriptedInference();
    service = new ChatService({ logger: silentLogger, inference, store });
  });

  it('generates a session id when none is given and echoes it', async () => {
    const result = await service.processChat({ message: 'Hello' });

    expect(result.sessionId).toMatch(UUID_V4);
    expect(result.response).toBe('Hello! How can I help?');
    expect(result.usage.total_tokens).toBe(20);

    const log = await service.getChatHistory(result.sessionId);
    expect(log).not.toBeNull();
    expect(log?.messages.map((m) => [m.role, m.content])).toEqual([
      ['user', 'Hello'],
      ['assistant', 'Hello! How can I help?'],
    ]);
  });

  it('uses the injected id generator', async () => {
    service = new ChatService({ logger: silentLogger, inference, store, generateSessionId: () => 'session-fixed' });
    const result = await service.processChat({ message: 'Hi' });
    expect(result.sessionId).toBe('session-fixed');
    expect(await store.getConversation('session-fixed')).not.toBeNull();
  });

  it('stores 2N messages in append order after N calls', async () => {
    inference = new ScriptedInference(['reply-1', 'reply-2', 'reply-3']);
    service = new ChatService({ logger: silentLogger, inference, store });

    for (const text of ['first', 'second', 'third']) {
      await service.processChat({ message: text, sessionId: 'abc' });
    }

    const log = await service.getChatHistory('abc');
    expect(log?.messages).toHaveLength(6);
    expect(log?.messages.map((m) => m.content)).toEqual([
      'first', 'reply-1', 'second', 'reply-2', 'third', 'reply-3',
    ]);
    expect(log?.messages.map((m) => m.role)).toEqual([
      'user', 'assistant', 'user', 'assistant', 'user', 'assistant',
    ]);
  });

  it('reports an unknown session as null rather than an empty log', async () => {
    expect(await service.getChatHistory('never-used')).toBeNull();
  });

  it('orders system prompt, last 10 stored messages, context, then the new message', async () => {
    const seeded: Message[] = Array.from({ length: 12 }, (_, i): Message => ({
      role: i % 2 === 0 ? 'user' : 'assistant',
      content: `m${i}`,
      timestamp: new Date(Date.UTC(2024, 0, 1, 0, i)),
    }));
    await store.appendMessages('s1', seeded, new Date(Date.UTC(2024, 0, 1)));

    await service.processChat({
      message: 'new question',
      sessionId: 's1',
      systemPrompt: 'Be brief',
      context: [
        { role: 'user', content: 'ctx-1' },
        { role: 'assistant', content: 'ctx-2' },
      ],
    });

    expect(inference.lastConversation).toEqual([
      { role: 'system', content: 'Be brief' },
      { role: 'user', content: 'm2' },
      { role: 'assistant', content: 'm3' },
      { role: 'user', content: 'm4' },
      { role: 'assistant', content: 'm5' },
      { role: 'user', content: 'm6' },
      { role: 'assistant', content: 'm7' },
      { role: 'user', content: 'm8' },
      { role: 'assistant', content: 'm9' },
      { role: 'user', content: 'm10' },
      { role: 'assistant', content: 'm11' },
      { role: 'user', content: 'ctx-1' },
      { role: 'assistant', content: 'ctx-2' },
      { role: 'user', content: 'new question' },
    ]);
  });

  it('sends only the new message for a fresh session without extras', async () => {
    await service.processChat({ message: 'solo', sessionId: 'fresh' });
    expect(inference.lastConversation).toEqual([{ role: 'user', content: 'solo' }]);
  });

  it('honours a configured history window', async () => {
    service = new ChatService({ logger: silentLogger, inference, store, historyWindow: 2 });
    await service.processChat({ message: 'one', sessionId: 'w' });
    await service.processChat({ message: 'two', sessionId: 'w' });

    expect(inference.lastConversation).toEqual([
      { role: 'user', content: 'one' },
      { role: 'assistant', content: 'Hello! How can I help?' },
      { role: 'user', content: 'two' },
    ]);
  });

  it('passes temperature and max tokens through, leaving omitted ones undefined', async () => {
    await service.processChat({ message: 'a', temperature: 0, maxTokens: 50 });
    await service.processChat({ message: 'b' });

    expect(inference.calls[0].options).toEqual({ temperature: 0, maxTokens: 50 });
    expect(inference.calls[1].options).toEqual({ temperature: undefined, maxTokens: undefined });
  });

  it('writes nothing when inference fails', async () => {
    inference = new ScriptedInference(['ok', new Error('quota exceeded')]);
    service = new ChatService({ logger: silentLogger, inference, store });

    await service.processChat({ message: 'first', sessionId: 'keep' });
    await expect(service.processChat({ message: 'second', sessionId: 'keep' })).rejects.toThrow('quota exceeded');

    const log = await store.getConversation('keep');
    expect(log?.messages.map((m) => m.content)).toEqual(['first', 'ok']);
  });

  it('does not create a log when the very first inference call fails', async () => {
    inference = new ScriptedInference([new Error('network down')]);
    service = new ChatService({ logger: silentLogger, inference, store });

    await expect(service.processChat({ message: 'hi', sessionId: 'new' })).rejects.toThrow('network down');
    expect(await store.getConversation('new')).toBeNull();
  });

  it('stamps both messages and the reply with the append time', async () => {
    const times = [new Date('2024-05-01T10:00:00.000Z'), new Date('2024-05-01T10:05:00.000Z')];
    service = new ChatService({ logger: silentLogger, inference, store, now: () => times.shift() ?? new Date(0) });

    const first = await service.processChat({ message: 'a', sessionId: 't' });
    await service.processChat({ message: 'b', sessionId: 't' });

    expect(first.timestamp.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    const log = await store.getConversation('t');
    expect(log?.createdAt.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    expect(log?.updatedAt.toISOString()).toBe('2024-05-01T10:05:00.000Z');
    expect(log?.messages.map((m) => m.timestamp.toISOString())).toEqual([
      '2024-05-01T10:00:00.000Z',
      '2024-05-01T10:00:00.000Z',
      '2024-05-01T10:05:00.000Z',
      '2024-05-01T10:05:00.000Z',
    ]);
  });
});
