import { Logger } from '@nestjs/common';
import {
  hoursAgo,
  makeNarrative,
  makeNarrativeArticle,
  NOW,
} from '../../../test/fixtures/narrative.fixtures';
import { buildNarrativeConfig } from '../config/narrative.config';
import { InMemoryNarrativeStore } from '../store/in-memory-narrative.store';
import { SummaryTask } from '../types/narrative.types';
import {
  fallbackText,
  NarrativeSummaryService,
  summaryInputForNarrative,
} from './narrative-summary.service';

function task(narrativeId: string, attempts = 0): SummaryTask {
  return {
    narrativeId,
    reason: 'articles_added',
    enqueuedAt: NOW.toISOString(),
    attempts,
  };
}

describe('fallbackText', () => {
  it('builds a deterministic title and summary from the fingerprint', () => {
    expect(
      fallbackText({
        fingerprint: {
          nucleusEntity: 'SEC',
          topActors: { SEC: 5, Coinbase: 4, 'Gary Gensler': 3 },
          keyActions: ['filed lawsuit', 'issued statement'],
          computedAt: NOW.toISOString(),
        },
        articleSummaries: ['', 'The SEC sued Coinbase.'],
      }),
    ).toEqual({
      title: 'SEC: filed lawsuit',
      summary:
        'Developing story around SEC involving Coinbase, Gary Gensler. Key developments: filed lawsuit, issued statement. Latest: The SEC sued Coinbase.',
    });
  });

  it('works without actors or actions', () => {
    expect(
      fallbackText({
        fingerprint: {
          nucleusEntity: 'Solana',
          topActors: {},
          keyActions: [],
          computedAt: NOW.toISOString(),
        },
        articleSummaries: [],
      }),
    ).toEqual({
      title: 'Solana developments',
      summary: 'Developing story around Solana.',
    });
  });
});

describe('summaryInputForNarrative', () => {
  it('uses the five most recent article summaries', () => {
    const narrative = makeNarrative({
      articles: Array.from({ length: 7 }, (_, i) =>
        makeNarrativeArticle(`a${i}`, hoursAgo(i), { summary: `s${i}` }),
      ),
    });

    expect(summaryInputForNarrative(narrative).articleSummaries).toEqual([
      's0',
      's1',
      's2',
      's3',
      's4',
    ]);
  });
});

describe('NarrativeSummaryService', () => {
  let store: InMemoryNarrativeStore;
  let generateJson: jest.Mock;
  let service: NarrativeSummaryService;

  beforeEach(async () => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    store = new InMemoryNarrativeStore();
    generateJson = jest.fn();
    service = new NarrativeSummaryService(
      { generateJson } as never,
      store,
      buildNarrativeConfig({ summaryMaxAttempts: 3 }),
    );
    await store.create(makeNarrative({ id: 'n', needsSummaryUpdate: true }));
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('regenerates text and completes the task', async () => {
    generateJson.mockResolvedValue({
      title: 'SEC widens crypto crackdown',
      summary: 'Regulators escalate.',
    });
    await store.enqueueSummaryTask(task('n'));

    const report = await service.processOutbox(10);

    expect(report).toEqual({
      claimed: 1,
      regenerated: 1,
      fallback: 0,
      retried: 0,
      orphaned: 0,
    });
    const narrative = await store.findById('n');
    expect(narrative?.title).toBe('SEC widens crypto crackdown');
    expect(narrative?.needsSummaryUpdate).toBe(false);
    expect(await store.listSummaryTasks(10)).toEqual([]);
  });

  it('retries while the model is unavailable and then falls back', async () => {
    generateJson.mockResolvedValue(null);
    await store.enqueueSummaryTask(task('n'));

    expect((await service.processOutbox(10)).retried).toBe(1);
    expect((await service.processOutbox(10)).retried).toBe(1);
    const last = await service.processOutbox(10);

    expect(last.fallback).toBe(1);
    const narrative = await store.findById('n');
    expect(narrative?.title).toBe('SEC: filed lawsuit');
    expect(narrative?.needsSummaryUpdate).toBe(false);
    expect(await store.listSummaryTasks(10)).toEqual([]);
  });

  it('treats an answer without a title as unavailable', async () => {
    generateJson.mockResolvedValue({ summary: 'only a summary' });
    await store.enqueueSummaryTask(task('n'));

    const report = await service.processOutbox(10);

    expect(report.retried).toBe(1);
    expect((await store.listSummaryTasks(10))[0].attempts).toBe(1);
  });

  it('keeps working through the outbox when one task fails', async () => {
    generateJson.mockResolvedValue({ title: 'New title', summary: 'New summary.' });
    await store.create(makeNarrative({ id: 'm', creationKey: 'k-m' }));
    await store.enqueueSummaryTask(task('n'));
    await store.enqueueSummaryTask(task('m'));
    jest.spyOn(store, 'save').mockRejectedValueOnce(new Error('disk full'));

    const report = await service.processOutbox(10);

    expect(report.regenerated).toBe(1);
    expect(Logger.prototype.warn).toHaveBeenCalledWith(
      'summary failed: narrative=n error=disk full',
    );
    expect((await store.findById('m'))?.title).toBe('New title');
    expect((await store.listSummaryTasks(10)).map((item) => item.narrativeId)).toEqual([
      'n',
    ]);
  });

  it('drops tasks whose narrative is gone', async () => {
    await store.enqueueSummaryTask(task('missing'));

    const report = await service.processOutbox(10);

    expect(report.orphaned).toBe(1);
    expect(generateJson).not.toHaveBeenCalled();
    expect(await store.listSummaryTasks(10)).toEqual([]);
  });
});
