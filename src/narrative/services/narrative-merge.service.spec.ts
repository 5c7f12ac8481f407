import { Logger } from '@nestjs/common';
import {
  daysAgo,
  hoursAgo,
  makeArticle,
  makeNarrative,
  makeNarrativeArticle,
  NOW,
} from '../../../test/fixtures/narrative.fixtures';
import { buildNarrativeConfig } from '../config/narrative.config';
import { NarrativeValidationError } from '../errors/narrative.errors';
import { InMemoryNarrativeStore } from '../store/in-memory-narrative.store';
import { ArticleCluster, ExtractedArticle } from '../types/narrative.types';
import { FingerprintService } from './fingerprint.service';
import { NarrativeLifecycleService } from './narrative-lifecycle.service';
import {
  buildCreationKey,
  buildTimeline,
  findPeakActivity,
  mergeSalience,
  NarrativeMergeService,
} from './narrative-merge.service';

function clusterOf(articles: ExtractedArticle[]): ArticleCluster {
  return {
    nucleusEntity: 'SEC',
    articles,
    actorSalience: { SEC: 5, Coinbase: 3 },
    actions: ['files lawsuit'],
    tensions: [],
    firstPublishedAt: articles[0].publishedAt,
    lastPublishedAt: articles[articles.length - 1].publishedAt,
  };
}

describe('NarrativeMergeService', () => {
  const config = buildNarrativeConfig();
  let store: InMemoryNarrativeStore;
  let service: NarrativeMergeService;

  beforeEach(() => {
    store = new InMemoryNarrativeStore();
    service = new NarrativeMergeService(
      store,
      new FingerprintService(config),
      new NarrativeLifecycleService(store, config),
      config,
    );
  });

  describe('buildNarrative', () => {
    it('takes firstSeen and lastUpdated from the article dates', () => {
      const cluster = clusterOf([
        makeArticle('b', daysAgo(2)),
        makeArticle('a', hoursAgo(3)),
      ]);

      const narrative = service.buildNarrative(
        cluster,
        {
          nucleusEntity: 'SEC',
          topActors: { SEC: 5 },
          keyActions: ['files lawsuit'],
          computedAt: NOW.toISOString(),
        },
        { title: 'SEC vs Coinbase', summary: 'The SEC sues Coinbase.' },
        NOW,
      );

      expect(narrative).toMatchObject({
        kind: 'narrative',
        firstSeen: daysAgo(2),
        lastUpdated: hoursAgo(3),
        createdAt: NOW.toISOString(),
        articleIds: ['b', 'a'],
        needsSummaryUpdate: false,
        creationKey: 'sec:a',
        lifecycleState: 'emerging',
      });
      expect(narrative.lifecycleHistory).toHaveLength(1);
      expect(narrative.timeline.map((snapshot) => snapshot.date)).toEqual([
        '2026-03-18',
        '2026-03-20',
      ]);
    });
  });

  describe('buildNarrative with an old article in the cluster', () => {
    const fingerprint = {
      nucleusEntity: 'SEC',
      topActors: { SEC: 5 },
      keyActions: ['files lawsuit'],
      computedAt: NOW.toISOString(),
    };
    const text = { title: 'SEC vs Coinbase', summary: 'The SEC sues Coinbase.' };

    it('starts a burst as emerging, not as a reawakening', () => {
      const cluster = clusterOf([
        makeArticle('old', daysAgo(10)),
        ...[20, 14, 8, 2].map((hours) => makeArticle(`b${hours}`, hoursAgo(hours))),
      ]);

      const narrative = service.buildNarrative(cluster, fingerprint, text, NOW);

      expect(narrative).toMatchObject({
        lifecycleState: 'emerging',
        mentionVelocity: 0.5714,
        reawakeningCount: 0,
        resurrectionVelocity: 0,
        reawakenedFrom: null,
      });
      expect(narrative.lifecycleHistory).toEqual([
        {
          state: 'emerging',
          timestamp: NOW.toISOString(),
          articleCount: 5,
          mentionVelocity: 0.5714,
        },
      ]);
    });

    it('starts a single fresh article as emerging, not as an echo', () => {
      const cluster = clusterOf([
        makeArticle('old', daysAgo(10)),
        makeArticle('fresh', hoursAgo(1)),
      ]);

      const narrative = service.buildNarrative(cluster, fingerprint, text, NOW);

      expect(narrative.lifecycleState).toBe('emerging');
      expect(narrative.reawakeningCount).toBe(0);
    });

    it('keeps the state when the same cycle refreshes lifecycles', async () => {
      const cluster = clusterOf([
        makeArticle('old', daysAgo(10)),
        ...[20, 14, 8, 2].map((hours) => makeArticle(`b${hours}`, hoursAgo(hours))),
      ]);
      const created = await service.createNarrative(cluster, fingerprint, text, NOW);
      jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);

      const updated = await new NarrativeLifecycleService(store, config).refreshAll(NOW);

      expect(updated).toBe(0);
      const stored = await store.findById(created.id);
      expect(stored?.lifecycleState).toBe('emerging');
      expect(stored?.reawakeningCount).toBe(0);
      jest.restoreAllMocks();
    });
  });

  describe('applyCluster', () => {
    it('adds only the new articles and keeps the nucleus', () => {
      const narrative = makeNarrative({
        id: 'n',
        publishedAt: [daysAgo(2), daysAgo(1)],
        entitySalience: { SEC: 5, Ripple: 2 },
      });
      const cluster = clusterOf([
        makeArticle('n-a2', daysAgo(1)),
        makeArticle('new-1', hoursAgo(2), { nucleusEntity: 'sec' }),
      ]);

      const result = service.applyCluster(narrative, cluster, NOW);

      expect(result?.reason).toBe('articles_added');
      expect(result?.narrative.articleIds).toEqual(['n-a1', 'n-a2', 'new-1']);
      expect(result?.narrative.articles).toHaveLength(3);
      expect(result?.narrative.fingerprint.nucleusEntity).toBe('SEC');
      expect(result?.narrative.entitySalience).toEqual({
        SEC: 5,
        Ripple: 2,
        Coinbase: 3,
      });
      expect(result?.narrative.firstSeen).toBe(daysAgo(2));
      expect(result?.narrative.lastUpdated).toBe(hoursAgo(2));
      expect(result?.narrative.needsSummaryUpdate).toBe(true);
    });

    it('is a no-op when every article is already held', () => {
      const narrative = makeNarrative({ id: 'n', publishedAt: [daysAgo(1)] });

      expect(
        service.applyCluster(narrative, clusterOf([makeArticle('n-a1', daysAgo(1))]), NOW),
      ).toBeNull();
    });

    it('flags a burst on a dormant narrative as a reactivation', () => {
      const narrative = makeNarrative({
        id: 'n',
        publishedAt: [daysAgo(20)],
        lifecycleState: 'dormant',
      });
      const cluster = clusterOf(
        ['r1', 'r2', 'r3', 'r4'].map((id, i) => makeArticle(id, hoursAgo(i + 1))),
      );

      const result = service.applyCluster(narrative, cluster, NOW);

      expect(result?.reason).toBe('reactivated');
      expect(result?.narrative.lifecycleState).toBe('reactivated');
      expect(result?.narrative.reawakeningCount).toBe(1);
      expect(result?.narrative.reawakenedFrom).toBe(daysAgo(20));
    });

    it('refuses to merge into a narrative whose nucleus is now deny-listed', () => {
      const strict = new NarrativeMergeService(
        store,
        new FingerprintService(buildNarrativeConfig({ denyEntities: ['SEC'] })),
        new NarrativeLifecycleService(store, config),
        config,
      );
      const narrative = makeNarrative({ id: 'n' });

      expect(() =>
        strict.applyCluster(narrative, clusterOf([makeArticle('x', hoursAgo(1))]), NOW),
      ).toThrow(NarrativeValidationError);
    });
  });

  describe('mergeCluster', () => {
    it('saves the narrative and its summary task in one write', async () => {
      const stored = await store.create(
        makeNarrative({ id: 'n', publishedAt: [daysAgo(1)] }),
      );

      const saved = await service.mergeCluster(
        stored,
        clusterOf([makeArticle('new-1', hoursAgo(1))]),
        NOW,
      );

      expect(saved?.revision).toBe(2);
      expect(await store.listSummaryTasks(10)).toEqual([
        {
          narrativeId: 'n',
          reason: 'articles_added',
          enqueuedAt: NOW.toISOString(),
          attempts: 0,
        },
      ]);
    });
  });

  describe('mergeNarratives', () => {
    it('counts the union once and records provenance', () => {
      const primary = makeNarrative({
        id: 'big',
        publishedAt: Array.from({ length: 23 }, (_, i) => hoursAgo(i + 1)),
      });
      const loser = makeNarrative({
        id: 'small',
        publishedAt: Array.from({ length: 5 }, (_, i) => hoursAgo(i + 30)),
        mergedFrom: ['older'],
      });
      loser.articles[0] = makeNarrativeArticle('big-a1', hoursAgo(1));
      loser.articleIds[0] = 'big-a1';

      const merged = service.mergeNarratives(primary, loser, NOW);

      expect(merged.id).toBe('big');
      expect(merged.articleIds).toHaveLength(27);
      expect(new Set(merged.articleIds).size).toBe(27);
      expect(merged.mergedFrom).toEqual(['small', 'older']);
      expect(merged.mergedAt).toBe(NOW.toISOString());
      expect(merged.firstSeen).toBe(hoursAgo(34));
    });
  });
});

describe('mergeSalience', () => {
  it('averages shared entities and keeps one-sided ones', () => {
    expect(mergeSalience({ SEC: 5, Ripple: 2 }, { SEC: 4, Coinbase: 3 })).toEqual({
      SEC: 4.5,
      Ripple: 2,
      Coinbase: 3,
    });
  });
});

describe('buildTimeline', () => {
  it('groups by UTC day with top entities and the trailing velocity', () => {
    const timeline = buildTimeline(
      [
        makeNarrativeArticle('a', '2026-03-18T08:00:00.000Z', {
          actors: { SEC: 5, Coinbase: 3 },
        }),
        makeNarrativeArticle('b', '2026-03-18T20:00:00.000Z', {
          actors: { Coinbase: 4 },
        }),
        makeNarrativeArticle('c', '2026-03-20T01:00:00.000Z', {
          actors: { Ripple: 2 },
        }),
      ],
      7,
    );

    expect(timeline).toEqual([
      {
        date: '2026-03-18',
        articleCount: 2,
        entities: ['Coinbase', 'SEC'],
        velocity: 0.2857,
      },
      {
        date: '2026-03-20',
        articleCount: 1,
        entities: ['Ripple'],
        velocity: 0.4286,
      },
    ]);
    expect(findPeakActivity(timeline)?.date).toBe('2026-03-18');
  });

  it('gives the later day a peak tie', () => {
    const timeline = buildTimeline(
      [
        makeNarrativeArticle('a', '2026-03-18T08:00:00.000Z'),
        makeNarrativeArticle('b', '2026-03-19T08:00:00.000Z'),
      ],
      7,
    );

    expect(findPeakActivity(timeline)?.date).toBe('2026-03-19');
    expect(findPeakActivity([])).toBeNull();
  });
});

describe('buildCreationKey', () => {
  it('combines the lower-cased nucleus with the smallest article id', () => {
    expect(buildCreationKey(' SEC ', ['c', 'a', 'b'])).toBe('sec:a');
  });
});
