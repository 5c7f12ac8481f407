import { Logger } from '@nestjs/common';
import { hoursAgo, makeArticle } from '../../../test/fixtures/narrative.fixtures';
import { buildNarrativeConfig } from '../config/narrative.config';
import {
  averageActorSalience,
  ClusterBuilderService,
  clusterOverlapScore,
} from './cluster-builder.service';

describe('ClusterBuilderService', () => {
  let service: ClusterBuilderService;

  beforeEach(() => {
    jest.spyOn(Logger.prototype, 'log').mockImplementation(() => undefined);
    service = new ClusterBuilderService(buildNarrativeConfig());
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('drops articles without a nucleus', () => {
    const clusters = service.build([
      makeArticle('a1', hoursAgo(3), { nucleusEntity: '' }),
      makeArticle('a2', hoursAgo(2)),
    ]);

    expect(clusters).toHaveLength(1);
    expect(clusters[0].articles.map((article) => article.id)).toEqual(['a2']);
  });

  it('groups by nucleus and orders clusters by nucleus then time', () => {
    const clusters = service.build([
      makeArticle('s2', hoursAgo(1)),
      makeArticle('b1', hoursAgo(5), {
        nucleusEntity: 'BTC',
        actors: { Bitcoin: 5, BlackRock: 3 },
      }),
      makeArticle('s1', hoursAgo(4), { nucleusEntity: 'sec' }),
    ]);

    expect(clusters.map((cluster) => cluster.articles.map((a) => a.id))).toEqual([
      ['b1'],
      ['s1', 's2'],
    ]);
    expect(clusters[1].firstPublishedAt).toBe(hoursAgo(4));
    expect(clusters[1].lastPublishedAt).toBe(hoursAgo(1));
  });

  it('splits a nucleus group whose actors do not overlap', () => {
    const clusters = service.build([
      makeArticle('a1', hoursAgo(5), {
        actors: { SEC: 5, Coinbase: 4 },
        tensions: ['regulation vs innovation'],
      }),
      makeArticle('a2', hoursAgo(4), {
        actors: { 'Jerome Powell': 5, 'Federal Reserve': 4 },
        tensions: ['rate cuts'],
      }),
      makeArticle('a3', hoursAgo(3), {
        actors: { SEC: 4, Coinbase: 5 },
        tensions: ['Regulation vs Innovation'],
      }),
    ]);

    expect(clusters.map((cluster) => cluster.articles.map((a) => a.id))).toEqual([
      ['a1', 'a3'],
      ['a2'],
    ]);
  });

  it('averages actor salience over the articles that mention the actor', () => {
    const clusters = service.build([
      makeArticle('a1', hoursAgo(3), {
        actors: { SEC: 5, Coinbase: 3 },
        actions: ['filed lawsuit'],
        tensions: [],
      }),
      makeArticle('a2', hoursAgo(2), {
        actors: { SEC: 4, Coinbase: 4, Ripple: 2 },
        actions: ['Filed lawsuit', 'issued statement'],
        tensions: [],
      }),
    ]);

    expect(clusters).toHaveLength(1);
    expect(clusters[0].actorSalience).toEqual({ SEC: 4.5, Coinbase: 3.5, Ripple: 2 });
    expect(clusters[0].actions).toEqual(['filed lawsuit', 'issued statement']);
  });

  it('uses the most common nucleus spelling, earliest on ties', () => {
    const clusters = service.build([
      makeArticle('a1', hoursAgo(3), { nucleusEntity: 'sec' }),
      makeArticle('a2', hoursAgo(2), { nucleusEntity: 'SEC' }),
    ]);

    expect(clusters[0].nucleusEntity).toBe('sec');
  });
});

describe('clusterOverlapScore', () => {
  it('uses the actor score alone when neither side has tensions', () => {
    expect(
      clusterOverlapScore({ SEC: 5 }, new Set(), { SEC: 5 }, new Set()),
    ).toBe(1);
  });

  it('blends actor and tension overlap', () => {
    const score = clusterOverlapScore(
      { SEC: 4, Coinbase: 2 },
      new Set(['a']),
      { SEC: 2, Coinbase: 2 },
      new Set(['b']),
    );
    // weighted jaccard = (2 + 2) / (4 + 2)
    expect(score).toBeCloseTo(0.7 * (4 / 6), 10);
  });
});

describe('averageActorSalience', () => {
  it('returns an empty map for no articles', () => {
    expect(averageActorSalience([])).toEqual({});
  });
});
