import {
  daysAgo,
  hoursAgo,
  makeNarrative,
  NOW,
} from '../../../test/fixtures/narrative.fixtures';
import { buildNarrativeConfig } from '../config/narrative.config';
import { InMemoryNarrativeStore } from '../store/in-memory-narrative.store';
import { Fingerprint } from '../types/narrative.types';
import {
  computeSimilarity,
  NarrativeMatcherService,
  resolveMatchThreshold,
} from './narrative-matcher.service';

function fingerprint(overrides: Partial<Fingerprint> = {}): Fingerprint {
  return {
    nucleusEntity: 'SEC',
    topActors: { SEC: 5, Coinbase: 3 },
    keyActions: ['files lawsuit'],
    computedAt: NOW.toISOString(),
    ...overrides,
  };
}

// shares 7 of 20 distinct actions with the other side
const SHARED = ['s1', 's2', 's3', 's4', 's5', 's6', 's7'];
const LEFT_ONLY = ['l1', 'l2', 'l3', 'l4', 'l5', 'l6'];
const RIGHT_ONLY = ['r1', 'r2', 'r3', 'r4', 'r5', 'r6', 'r7'];

describe('computeSimilarity', () => {
  it('scores identical fingerprints as 1', () => {
    expect(computeSimilarity(fingerprint(), fingerprint())).toBe(1);
  });

  it('weights nucleus, actors and actions', () => {
    const score = computeSimilarity(
      fingerprint({ topActors: { SEC: 5, Coinbase: 3 }, keyActions: ['a'] }),
      fingerprint({ topActors: { SEC: 5, Ripple: 3 }, keyActions: ['b'] }),
    );
    // 0.45 + 0.35 * 1/3 + 0 + 0.1
    expect(score).toBe(0.6667);
  });

  it('gives only the bonus when nuclei differ in case', () => {
    const score = computeSimilarity(
      fingerprint({ nucleusEntity: 'sec', topActors: {}, keyActions: [] }),
      fingerprint({ nucleusEntity: 'SEC', topActors: {}, keyActions: [] }),
    );
    expect(score).toBe(0.1);
  });

  it('compares actions case-insensitively', () => {
    const score = computeSimilarity(
      fingerprint({ nucleusEntity: 'A', topActors: {}, keyActions: ['Files Lawsuit '] }),
      fingerprint({ nucleusEntity: 'B', topActors: {}, keyActions: ['files lawsuit'] }),
    );
    expect(score).toBe(0.2);
  });
});

describe('resolveMatchThreshold', () => {
  const config = buildNarrativeConfig();

  it('lowers the bar for narratives updated within 48 hours', () => {
    expect(resolveMatchThreshold(10, config)).toBe(0.5);
    expect(resolveMatchThreshold(48, config)).toBe(0.5);
    expect(resolveMatchThreshold(49, config)).toBe(0.6);
    expect(resolveMatchThreshold(120, config)).toBe(0.6);
  });
});

describe('NarrativeMatcherService', () => {
  let store: InMemoryNarrativeStore;
  let service: NarrativeMatcherService;

  beforeEach(() => {
    store = new InMemoryNarrativeStore();
    service = new NarrativeMatcherService(store, buildNarrativeConfig());
  });

  it('merges a 0.52 match into a narrative updated 10 hours ago but not 5 days ago', () => {
    const incoming = fingerprint({
      nucleusEntity: 'sec',
      keyActions: [...SHARED, ...LEFT_ONLY],
    });
    const existing = fingerprint({ keyActions: [...SHARED, ...RIGHT_ONLY] });
    expect(computeSimilarity(incoming, existing)).toBe(0.52);

    const recent = makeNarrative({
      id: 'recent',
      fingerprint: existing,
      publishedAt: [hoursAgo(10)],
    });
    const stale = makeNarrative({
      id: 'stale',
      fingerprint: existing,
      publishedAt: [daysAgo(5)],
    });

    expect(service.selectMatch(incoming, [recent], NOW)?.narrative.id).toBe(
      'recent',
    );
    expect(service.selectMatch(incoming, [stale], NOW)).toBeNull();
  });

  it('prefers the larger narrative when similarity ties', () => {
    const small = makeNarrative({
      id: 'small',
      fingerprint: fingerprint(),
      publishedAt: Array.from({ length: 5 }, (_, i) => hoursAgo(10 + i)),
    });
    const large = makeNarrative({
      id: 'large',
      fingerprint: fingerprint(),
      publishedAt: Array.from({ length: 23 }, (_, i) => hoursAgo(20 + i)),
    });

    const match = service.selectMatch(fingerprint(), [small, large], NOW);

    expect(match?.narrative.id).toBe('large');
    expect(match?.similarity).toBe(1);
  });

  it('breaks remaining ties by recency then by age', () => {
    const older = makeNarrative({
      id: 'older',
      fingerprint: fingerprint(),
      publishedAt: [hoursAgo(6)],
      createdAt: daysAgo(3),
    });
    const newer = makeNarrative({
      id: 'newer',
      fingerprint: fingerprint(),
      publishedAt: [hoursAgo(2)],
    });
    const twin = makeNarrative({
      id: 'twin',
      fingerprint: fingerprint(),
      publishedAt: [hoursAgo(2)],
      createdAt: daysAgo(9),
    });

    expect(service.selectMatch(fingerprint(), [older, newer], NOW)?.narrative.id).toBe(
      'newer',
    );
    expect(service.selectMatch(fingerprint(), [newer, twin], NOW)?.narrative.id).toBe(
      'twin',
    );
  });

  it('matches the worked SEC example against a narrative updated two days ago', () => {
    const existing = makeNarrative({
      fingerprint: fingerprint(),
      publishedAt: [daysAgo(2)],
    });

    const match = service.selectMatch(fingerprint(), [existing], NOW);

    expect(match?.similarity).toBeGreaterThanOrEqual(0.9);
    expect(match?.threshold).toBe(0.6);
  });

  it('loads candidates within the match and reactivation windows', async () => {
    await store.create(
      makeNarrative({ id: 'live', creationKey: 'k1', publishedAt: [daysAgo(10)] }),
    );
    await store.create(
      makeNarrative({
        id: 'quiet',
        creationKey: 'k2',
        publishedAt: [daysAgo(25)],
        lifecycleState: 'echo',
      }),
    );
    await store.create(
      makeNarrative({ id: 'gone', creationKey: 'k3', publishedAt: [daysAgo(20)] }),
    );

    const candidates = await service.loadCandidates(NOW);

    expect(candidates.map((item) => item.id)).toEqual(['live', 'quiet']);
  });
});
