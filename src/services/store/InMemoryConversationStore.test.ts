import { describe, it, expect } from 'vitest';
import { InMemoryConversationStore } from './InMemoryConversationStore';
import type { Message } from '../../models/chat.model';

const at = (minute: number) => new Date(Date.UTC(2024, 2, 3, 12, minute));

describe('InMemoryConversationStore', () => {
  it('creates a log on first append and keeps createdAt on later ones', async () => {
    const store = new InMemoryConversationStore();
    await store.appendMessages('s', [{ role: 'user', content: 'a', timestamp: at(0) }], at(0));
    await store.appendMessages('s', [{ role: 'assistant', content: 'b', timestamp: at(1) }], at(1));

    const log = await store.getConversation('s');
    expect(log?.sessionId).toBe('s');
    expect(log?.createdAt).toEqual(at(0));
    expect(log?.updatedAt).toEqual(at(1));
    expect(log?.messages).toEqual([
      { role: 'user', content: 'a', timestamp: at(0) },
      { role: 'assistant', content: 'b', timestamp: at(1) },
    ]);
  });

  it('returns content with quotes and newlines byte-identical', async () => {
    const store = new InMemoryConversationStore();
    const content = 'He said "hi"\n{"json": [1, 2]}\t\\ end';
    await store.appendMessages('s', [{ role: 'user', content, timestamp: at(0) }], at(0));

    const log = await store.getConversation('s');
    expect(log?.messages[0].content).toBe(content);
  });

  it('returns the most recent messages oldest first', async () => {
    const store = new InMemoryConversationStore();
    const messages: Message[] = ['a', 'b', 'c', 'd'].map((content, i): Message => ({ role: 'user', content, timestamp: at(i) }));
    await store.appendMessages('s', messages, at(4));

    expect((await store.getRecentMessages('s', 2)).map((m) => m.content)).toEqual(['c', 'd']);
    expect((await store.getRecentMessages('s', 10)).map((m) => m.content)).toEqual(['a', 'b', 'c', 'd']);
    expect(await store.getRecentMessages('s', 0)).toEqual([]);
    expect(await store.getRecentMessages('unknown', 5)).toEqual([]);
  });

  it('hands out copies that callers cannot use to rewrite history', async () => {
    const store = new InMemoryConversationStore();
    await store.appendMessages('s', [{ role: 'user', content: 'original', timestamp: at(0) }], at(0));

    const log = await store.getConversation('s');
    log?.messages.push({ role: 'user', content: 'injected', timestamp: at(1) });

    const again = await store.getConversation('s');
    expect(again?.messages.map((m) => m.content)).toEqual(['original']);
  });
});
