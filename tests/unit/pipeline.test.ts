/// <reference types="jest" />
import { MessagePipeline, PERMISSION_WARNING, PipelineConfig, senderLabel } from '../../src/moderation/pipeline';
import { FakePlatform, message } from '../helpers/fake-platform';

function config(options: { enabled?: number[]; keywords?: Record<number, string[]>; caseSensitive?: boolean } = {}): PipelineConfig {
  const enabled = new Set(options.enabled ?? []);
  return {
    isEnabled: chatId => enabled.has(chatId),
    getChatKeywords: chatId => new Set(options.keywords?.[chatId] ?? []),
    isCaseSensitive: () => options.caseSensitive ?? false,
  };
}

describe('MessagePipeline', () => {
  const leakChat = () => config({ enabled: [-100], keywords: { [-100]: ['leak'] } });

  it('replaces a matching message in the same topic', async () => {
    const platform = new FakePlatform();
    const pipeline = new MessagePipeline(leakChat(), platform);

    const result = await pipeline.process(message({ text: 'no LEAK here', threadId: 5 }));

    expect(result.state).toBe('SUCCEEDED');
    expect(result.trail).toEqual(['RECEIVED', 'GATE_CHECKED', 'MATCHED', 'REWRITTEN', 'REPUBLISH_ATTEMPTED', 'SUCCEEDED']);
    expect(result.text).toBe('U: no ||LEAK|| here');
    expect(platform.deleted).toEqual([{ chatId: -100, messageId: 42 }]);
    expect(platform.sent).toEqual([
      {
        target: { chatId: -100, threadId: 5 },
        text: 'U: no ||LEAK|| here',
        options: {
          segments: [
            { text: 'U: ', hidden: false },
            { text: 'no ', hidden: false },
            { text: 'LEAK', hidden: true },
            { text: ' here', hidden: false },
          ],
        },
      },
    ]);
  });

  it('hides the keyword even when the author typed spoiler bars', async () => {
    const platform = new FakePlatform();
    const pipeline = new MessagePipeline(leakChat(), platform);

    await pipeline.process(message({ text: 'see ||the leak' }));

    expect(platform.sent[0].text).toBe('U: see ||the ||leak||');
    expect(platform.sent[0].options?.segments).toEqual([
      { text: 'U: ', hidden: false },
      { text: 'see ||the ', hidden: false },
      { text: 'leak', hidden: true },
    ]);
  });

  it('warns once when the original cannot be deleted', async () => {
    const platform = new FakePlatform();
    platform.deleteError = new Error('Bad Request: message can\'t be deleted');
    const pipeline = new MessagePipeline(leakChat(), platform);

    const result = await pipeline.process(message({ text: 'no LEAK here', threadId: 5 }));

    expect(result.state).toBe('DEGRADED');
    expect(result.failure?.step).toBe('delete');
    expect(result.trail.slice(-2)).toEqual(['REPUBLISH_ATTEMPTED', 'DEGRADED']);
    expect(platform.sent).toEqual([{ target: { chatId: -100, threadId: 5 }, text: PERMISSION_WARNING }]);
  });

  it('warns once when the replacement cannot be posted', async () => {
    const platform = new FakePlatform();
    platform.sendError = text => (text === PERMISSION_WARNING ? undefined : new Error('Forbidden'));
    const pipeline = new MessagePipeline(leakChat(), platform);

    const result = await pipeline.process(message({ text: 'a leak' }));

    expect(result.state).toBe('DEGRADED');
    expect(result.failure?.step).toBe('send');
    expect(platform.deleted).toHaveLength(1);
    expect(platform.texts()).toEqual([PERMISSION_WARNING]);
    expect(platform.sendAttempts).toBe(2);
  });

  it('stays degraded when even the warning fails', async () => {
    const platform = new FakePlatform();
    platform.deleteError = new Error('Forbidden');
    platform.sendError = () => new Error('Forbidden');
    const pipeline = new MessagePipeline(leakChat(), platform);

    const result = await pipeline.process(message({ text: 'a leak' }));

    expect(result.state).toBe('DEGRADED');
    expect(platform.sendAttempts).toBe(1);
  });

  const skipCases: Array<[string, PipelineConfig, string | undefined]> = [
    ['chat-disabled', config({ keywords: { [-100]: ['leak'] } }), 'a leak'],
    ['no-keywords', config({ enabled: [-100] }), 'a leak'],
    ['no-match', leakChat(), 'leaky pipes'],
    ['no-text', leakChat(), undefined],
  ];

  it.each(skipCases)('skips with %s', async (reason, cfg, text) => {
    const platform = new FakePlatform();
    const result = await new MessagePipeline(cfg, platform).process(message({ text }));
    expect(result.state).toBe('SKIPPED');
    expect(result.skipReason).toBe(reason);
    expect(platform.deleted).toEqual([]);
    expect(platform.sent).toEqual([]);
  });

  it('never uses keywords of another chat', async () => {
    const platform = new FakePlatform();
    const cfg = config({ enabled: [-100, -200], keywords: { [-100]: ['leak'], [-200]: ['twist'] } });
    const pipeline = new MessagePipeline(cfg, platform);

    const inB = await pipeline.process(message({ chatId: -200, text: 'a leak' }));
    const inA = await pipeline.process(message({ chatId: -100, text: 'a twist' }));

    expect(inB.skipReason).toBe('no-match');
    expect(inA.skipReason).toBe('no-match');
    expect(platform.sent).toEqual([]);
  });

  it('respects case-sensitive matching', async () => {
    const platform = new FakePlatform();
    const cfg = config({ enabled: [-100], keywords: { [-100]: ['Leak'] }, caseSensitive: true });
    const result = await new MessagePipeline(cfg, platform).process(message({ text: 'a leak' }));
    expect(result.skipReason).toBe('no-match');
  });
});

describe('senderLabel', () => {
  it('prefers the handle, then the display name', () => {
    expect(senderLabel({ id: 1, username: 'alice', firstName: 'Alice' })).toBe('@alice');
    expect(senderLabel({ id: 1, firstName: 'Alice' })).toBe('Alice');
    expect(senderLabel({ senderChatTitle: 'News' })).toBe('News');
    expect(senderLabel({})).toBe('someone');
  });
});
