import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  CLUSTER_ACTOR_WEIGHT,
  CLUSTER_TENSION_WEIGHT,
} from '../config/narrative.constants';
import { NARRATIVE_CONFIG, NarrativeConfig } from '../config/narrative.config';
import { ArticleCluster, ExtractedArticle } from '../types/narrative.types';
import { toTime } from '../utils/date.util';
import { entityKey } from '../utils/entity.util';
import { jaccard, phraseSet, roundTo, weightedJaccard } from '../utils/similarity.util';
import { uniquePhrases } from '../utils/text.util';

interface Subcluster {
  articles: ExtractedArticle[];
  actors: Record<string, number>;
  tensions: Set<string>;
}

/** Average salience per actor, over the articles that mention it. */
export function averageActorSalience(
  articles: ExtractedArticle[],
): Record<string, number> {
  const sums = new Map<string, { total: number; count: number }>();
  for (const article of articles) {
    for (const [name, salience] of Object.entries(article.extraction.actors)) {
      const entry = sums.get(name) ?? { total: 0, count: 0 };
      entry.total += salience;
      entry.count += 1;
      sums.set(name, entry);
    }
  }
  const out: Record<string, number> = {};
  for (const [name, { total, count }] of sums) {
    out[name] = roundTo(total / count);
  }
  return out;
}

export function clusterOverlapScore(
  actorsA: Record<string, number>,
  tensionsA: Set<string>,
  actorsB: Record<string, number>,
  tensionsB: Set<string>,
): number {
  const actorScore = weightedJaccard(actorsA, actorsB);
  if (tensionsA.size === 0 && tensionsB.size === 0) {
    return actorScore;
  }
  return (
    CLUSTER_ACTOR_WEIGHT * actorScore +
    CLUSTER_TENSION_WEIGHT * jaccard(tensionsA, tensionsB)
  );
}

function byPublishOrder(a: ExtractedArticle, b: ExtractedArticle): number {
  return toTime(a.publishedAt) - toTime(b.publishedAt) || a.id.localeCompare(b.id);
}

@Injectable()
export class ClusterBuilderService {
  private readonly logger = new Logger(ClusterBuilderService.name);

  constructor(
    @Inject(NARRATIVE_CONFIG) private readonly config: NarrativeConfig,
  ) {}

  build(articles: ExtractedArticle[]): ArticleCluster[] {
    const groups = new Map<string, ExtractedArticle[]>();
    let dropped = 0;

    for (const article of [...articles].sort(byPublishOrder)) {
      const key = entityKey(article.extraction.nucleusEntity);
      if (!key) {
        dropped += 1;
        this.logger.log(`cluster skip: article=${article.id} has no nucleus`);
        continue;
      }
      const group = groups.get(key) ?? [];
      group.push(article);
      groups.set(key, group);
    }

    const clusters: ArticleCluster[] = [];
    for (const key of [...groups.keys()].sort()) {
      for (const subcluster of this.subdivide(groups.get(key) ?? [])) {
        clusters.push(this.toCluster(subcluster.articles));
      }
    }

    clusters.sort(
      (a, b) =>
        entityKey(a.nucleusEntity).localeCompare(entityKey(b.nucleusEntity)) ||
        toTime(a.firstPublishedAt) - toTime(b.firstPublishedAt),
    );
    this.logger.log(
      `stage clustering done: articles=${articles.length} dropped=${dropped} clusters=${clusters.length}`,
    );
    return clusters;
  }

  private subdivide(group: ExtractedArticle[]): Subcluster[] {
    const subclusters: Subcluster[] = [];
    for (const article of group) {
      const actors = article.extraction.actors;
      const tensions = phraseSet(article.extraction.tensions);
      const target = subclusters.find(
        (candidate) =>
          clusterOverlapScore(
            candidate.actors,
            candidate.tensions,
            actors,
            tensions,
          ) >= this.config.clusterGroupingThreshold,
      );

      if (!target) {
        subclusters.push({ articles: [article], actors: { ...actors }, tensions });
        continue;
      }
      target.articles.push(article);
      target.actors = averageActorSalience(target.articles);
      for (const tension of tensions) {
        target.tensions.add(tension);
      }
    }
    return subclusters;
  }

  private toCluster(articles: ExtractedArticle[]): ArticleCluster {
    return {
      nucleusEntity: this.majorityNucleus(articles),
      articles,
      actorSalience: averageActorSalience(articles),
      actions: uniquePhrases(articles.flatMap((article) => article.extraction.actions)),
      tensions: uniquePhrases(articles.flatMap((article) => article.extraction.tensions)),
      firstPublishedAt: articles[0].publishedAt,
      lastPublishedAt: articles[articles.length - 1].publishedAt,
    };
  }

  // 동률이면 가장 먼저 나온 표기
  private majorityNucleus(articles: ExtractedArticle[]): string {
    const counts = new Map<string, number>();
    for (const article of articles) {
      const name = article.extraction.nucleusEntity.trim();
      counts.set(name, (counts.get(name) ?? 0) + 1);
    }
    let best = '';
    let bestCount = 0;
    for (const [name, count] of counts) {
      if (count > bestCount) {
        best = name;
        bestCount = count;
      }
    }
    return best;
  }
}
