import type {
  DiscoveryResults,
  EntityKind,
  HealthStatus,
  MatchingTool,
  ScoredResult,
} from "@repo/zod-types";

import { type RegisteredEntity, parentServerIdOf } from "../registry/types";
import stopwordList from "./stopwords.json";

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const SNIPPET_LENGTH = 180;
const MATCHING_TOOLS_PER_SERVER = 5;

export interface RankingWeights {
  vectorWeight: number;
  keywordWeight: number;
  exactNameBoost: number;
  partialNameBoost: number;
  minSimilarity: number;
}

export interface RankCandidate {
  entity: RegisteredEntity;
  indexableText: string;
  /** Cosine similarity to the query, or null when no vector was compared */
  similarity: number | null;
}

export interface RankedEntity {
  entity: RegisteredEntity;
  score: number;
  similarity: number;
  keywordScore: number;
  boost: number;
}

/**
 * Lowercase terms of `text`, split on anything that is not a letter or digit.
 * Short tokens and stopwords are dropped; order of first appearance is kept.
 */
export function tokenize(text: string): string[] {
  const seen = new Set<string>();
  for (const token of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (token.length > 2 && !STOPWORDS.has(token)) seen.add(token);
  }
  return [...seen];
}

/** Fraction of query tokens present in the entity's indexable text. */
export function keywordScore(queryTokens: readonly string[], textTokens: ReadonlySet<string>): number {
  if (queryTokens.length === 0) return 0;
  let matched = 0;
  for (const token of queryTokens) {
    if (textTokens.has(token)) matched++;
  }
  return matched / queryTokens.length;
}

function normalizeName(value: string): string {
  return value
    .toLowerCase()
    .trim()
    .replace(/^["'`/]+/, "")
    .replace(/["'`.,!?;:/]+$/, "")
    .replace(/\s+/g, " ");
}

/**
 * Boost for queries that name the entity. An exact match on the display name
 * (or on the id, or a tool's own name) outweighs anything vector and keyword
 * scores can add up to; a query contained in the name earns a smaller boost.
 */
export function nameBoost(query: string, entity: RegisteredEntity, weights: RankingWeights): number {
  const normalizedQuery = normalizeName(query);
  if (normalizedQuery.length === 0) return 0;

  const names = [entity.displayName, entity.id];
  if (entity.kind === "tool") names.push(entity.toolName);
  if (names.some((name) => normalizeName(name) === normalizedQuery)) {
    return weights.exactNameBoost;
  }

  if (normalizedQuery.length > 2 && normalizeName(entity.displayName).includes(normalizedQuery)) {
    return weights.partialNameBoost;
  }
  return 0;
}

function compareRanked(a: RankedEntity, b: RankedEntity): number {
  if (a.score !== b.score) return b.score - a.score;
  return a.entity.id < b.entity.id ? -1 : a.entity.id > b.entity.id ? 1 : 0;
}

/**
 * Merge vector similarity with keyword overlap and name boosts into a single
 * ordering. Pure over its inputs: the same candidates always produce the same
 * list.
 *
 * A candidate with a weak vector match, no keyword overlap and no name boost
 * is dropped, so a query with nothing relevant yields an empty list.
 */
export function rank(
  queryText: string,
  candidates: readonly RankCandidate[],
  weights: RankingWeights,
): RankedEntity[] {
  const queryTokens = tokenize(queryText);
  const ranked: RankedEntity[] = [];

  for (const candidate of candidates) {
    const similarity = Math.max(0, Math.min(1, candidate.similarity ?? 0));
    const keyword =
      queryTokens.length === 0
        ? 0
        : keywordScore(queryTokens, new Set(tokenize(candidate.indexableText)));
    const boost = nameBoost(queryText, candidate.entity, weights);

    if (similarity < weights.minSimilarity && keyword === 0 && boost === 0) {
      continue;
    }

    ranked.push({
      entity: candidate.entity,
      score: weights.vectorWeight * similarity + weights.keywordWeight * keyword + boost,
      similarity,
      keywordScore: keyword,
      boost,
    });
  }

  return ranked.sort(compareRanked);
}

export function buildSnippet(entity: RegisteredEntity): string {
  const source =
    entity.description.trim() || entity.tags.join(", ") || entity.id;
  // Code points, so a surrogate pair is never cut in half
  const chars = [...source];
  return chars.length > SNIPPET_LENGTH
    ? `${chars.slice(0, SNIPPET_LENGTH - 1).join("")}…`
    : source;
}

const roundScore = (score: number) => Math.round(score * 1e6) / 1e6;

function toMatchingTool(ranked: RankedEntity): MatchingTool {
  const { entity } = ranked;
  return {
    entityId: entity.id,
    toolName: entity.kind === "tool" ? entity.toolName : entity.displayName,
    score: roundScore(ranked.score),
    snippet: buildSnippet(entity),
  };
}

export function toScoredResult(
  ranked: RankedEntity,
  health: HealthStatus,
  matchingTools: readonly RankedEntity[] = [],
): ScoredResult {
  const { entity } = ranked;
  const result: ScoredResult = {
    entityId: entity.id,
    entityKind: entity.kind,
    displayName: entity.displayName,
    score: roundScore(ranked.score),
    snippet: buildSnippet(entity),
    tags: [...entity.tags],
    parentServerId: parentServerIdOf(entity),
    health,
  };

  switch (entity.kind) {
    case "server":
      return {
        ...result,
        numTools: entity.tools.length,
        matchingTools: matchingTools.map(toMatchingTool),
      };
    case "agent":
      return { ...result, skills: entity.skills.map((skill) => skill.name) };
    case "tool":
      return result;
  }
}

/**
 * Split a global ranking into per-kind lists, keeping the global order inside
 * each list and capping each at `maxResults`. When tools were requested, each
 * server result also lists its best-ranked derived tools.
 */
export function partitionResults(
  ranked: readonly RankedEntity[],
  maxResults: number,
  kinds: ReadonlySet<EntityKind>,
  healthOf: (entityId: string) => HealthStatus = () => "unknown",
): DiscoveryResults {
  const results: DiscoveryResults = { servers: [], tools: [], agents: [] };
  const partitions: Record<EntityKind, ScoredResult[]> = {
    server: results.servers,
    tool: results.tools,
    agent: results.agents,
  };

  const toolsByServer = new Map<string, RankedEntity[]>();
  if (kinds.has("tool")) {
    for (const item of ranked) {
      const serverId = parentServerIdOf(item.entity);
      if (serverId === null) continue;
      const matches = toolsByServer.get(serverId) ?? [];
      if (matches.length < MATCHING_TOOLS_PER_SERVER) matches.push(item);
      toolsByServer.set(serverId, matches);
    }
  }

  for (const item of ranked) {
    if (!kinds.has(item.entity.kind)) continue;
    const partition = partitions[item.entity.kind];
    if (partition.length >= maxResults) continue;
    partition.push(
      toScoredResult(item, healthOf(item.entity.id), toolsByServer.get(item.entity.id)),
    );
  }
  return results;
}
