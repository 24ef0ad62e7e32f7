import type { z } from 'zod';

import { isoNow, type AgentStore } from '../db.js';
import { InvalidArgumentError, NotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import { parseInput } from '../validation.js';
import {
  LearnSkillInput,
  RecentEpisodesInput,
  RecordEpisodeInput,
  RememberWorkingInput,
  SearchInput,
  SkillExecutionInput,
  UpsertConceptInput,
} from './schemas.js';
import type {
  ConceptUpsertResult,
  EpisodicMemoryItem,
  MemoryStatus,
  ProceduralMemoryItem,
  SearchHit,
  SearchScope,
  SemanticMemoryItem,
  WorkingMemoryItem,
} from './types.js';

const MINUTE_MS = 60_000;

// Last instant toISOString() writes with a four-digit year, which sorts as text
const LATEST_EXPIRY_MS = Date.UTC(9999, 11, 31, 23, 59, 59, 999);

/** `%needle%` for LIKE ... ESCAPE '\', with the LIKE wildcards taken literally. */
function likePattern(query: string): string {
  return `%${query.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;
}

/**
 * The four memory tiers. Each tier is its own table with its own identity
 * and retention rule:
 * - working: short-lived context, hidden from reads once expired
 * - episodic: append-only event log
 * - semantic: one row per concept, last writer wins
 * - procedural: one row per skill, counters accumulate over executions
 */
export class MemoryTiers {
  constructor(private readonly store: AgentStore) {}

  /** Groups several tier writes into one transaction. */
  atomically<T>(fn: () => T): T {
    return this.store.write(() => fn());
  }

  // ==================== Working memory ====================

  rememberWorking(input: z.input<typeof RememberWorkingInput>): number {
    const args = parseInput(RememberWorkingInput, input);
    const now = this.store.now();
    const ttlMs = Math.max(1, Math.round(args.ttl_minutes * MINUTE_MS));
    const expiresMs = now.getTime() + ttlMs;
    if (expiresMs > LATEST_EXPIRY_MS) {
      throw new InvalidArgumentError('ttl_minutes: expiry would fall after year 9999');
    }
    const expiresAt = new Date(expiresMs).toISOString();

    const id = this.store.write((db) =>
      Number(
        db
          .prepare(
            `INSERT INTO working_memory (context_key, content, priority, created_at, expires_at)
             VALUES (?, ?, ?, ?, ?)`,
          )
          .run(args.context_key, args.content, args.priority, now.toISOString(), expiresAt)
          .lastInsertRowid,
      ),
    );
    logger.debug({ id, contextKey: args.context_key, expiresAt }, 'Working memory stored');
    return id;
  }

  recallWorking(contextKey?: string | null): WorkingMemoryItem[] {
    const now = isoNow(this.store);
    return this.store.read((db) =>
      contextKey != null
        ? (db
            .prepare(
              `SELECT * FROM working_memory
               WHERE context_key = ? AND expires_at > ?
               ORDER BY priority DESC, created_at DESC, id DESC`,
            )
            .all(contextKey, now) as WorkingMemoryItem[])
        : (db
            .prepare(
              `SELECT * FROM working_memory
               WHERE expires_at > ?
               ORDER BY priority DESC, created_at DESC, id DESC`,
            )
            .all(now) as WorkingMemoryItem[]),
    );
  }

  /** Physically removes expired working-memory rows. Returns how many went. */
  sweepExpiredWorking(): number {
    const now = isoNow(this.store);
    return this.store.write(
      (db) => db.prepare('DELETE FROM working_memory WHERE expires_at <= ?').run(now).changes,
    );
  }

  // ==================== Episodic memory ====================

  recordEpisode(input: z.input<typeof RecordEpisodeInput>): number {
    const args = parseInput(RecordEpisodeInput, input);
    const id = this.store.write((db) =>
      Number(
        db
          .prepare(
            `INSERT INTO episodic_memory (event_type, content, significance, created_at)
             VALUES (?, ?, ?, ?)`,
          )
          .run(args.event_type, args.content, args.significance, isoNow(this.store))
          .lastInsertRowid,
      ),
    );
    logger.debug({ id, eventType: args.event_type }, 'Episode recorded');
    return id;
  }

  /** Newest first, or most significant first (oldest first on ties). */
  recentEpisodes(input: z.input<typeof RecentEpisodesInput> = {}): EpisodicMemoryItem[] {
    const args = parseInput(RecentEpisodesInput, input);
    const clauses: string[] = [];
    const params: (string | number)[] = [];
    if (args.event_type !== undefined) {
      clauses.push('event_type = ?');
      params.push(args.event_type);
    }
    if (args.min_significance !== undefined) {
      clauses.push('significance >= ?');
      params.push(args.min_significance);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const order =
      args.order === 'significance' ? 'significance DESC, id ASC' : 'created_at DESC, id DESC';

    return this.store.read(
      (db) =>
        db
          .prepare(
            `SELECT * FROM episodic_memory ${where}
             ORDER BY ${order} LIMIT ?`,
          )
          .all(...params, args.limit) as EpisodicMemoryItem[],
    );
  }

  // ==================== Semantic memory ====================

  upsertConcept(input: z.input<typeof UpsertConceptInput>): ConceptUpsertResult {
    const args = parseInput(UpsertConceptInput, input);

    return this.store.write((db) => {
      const existing = db
        .prepare('SELECT 1 FROM semantic_memory WHERE concept = ?')
        .get(args.concept);
      const createdAt = isoNow(this.store);

      db.prepare(
        `INSERT INTO semantic_memory (concept, definition, confidence, created_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(concept) DO UPDATE SET
           definition = excluded.definition,
           confidence = excluded.confidence,
           created_at = excluded.created_at`,
      ).run(args.concept, args.definition, args.confidence, createdAt);

      logger.debug({ concept: args.concept, replaced: !!existing }, 'Concept upserted');
      return {
        concept: args.concept,
        definition: args.definition,
        confidence: args.confidence,
        created_at: createdAt,
        replaced: !!existing,
      };
    });
  }

  getConcepts(concepts: readonly string[]): SemanticMemoryItem[] {
    if (concepts.length === 0) return [];
    const placeholders = concepts.map(() => '?').join(', ');
    return this.store.read(
      (db) =>
        db
          .prepare(
            `SELECT concept, definition, confidence, created_at FROM semantic_memory
             WHERE concept IN (${placeholders}) ORDER BY id`,
          )
          .all(...concepts) as SemanticMemoryItem[],
    );
  }

  // ==================== Procedural memory ====================

  /** Inserts a skill, or rewrites the steps of a known one keeping its counters. */
  learnSkill(input: z.input<typeof LearnSkillInput>): ProceduralMemoryItem {
    const args = parseInput(LearnSkillInput, input);
    return this.store.write((db) => {
      db.prepare(
        `INSERT INTO procedural_memory (skill_name, steps, created_at)
         VALUES (?, ?, ?)
         ON CONFLICT(skill_name) DO UPDATE SET steps = excluded.steps`,
      ).run(args.skill_name, args.steps, isoNow(this.store));
      return db
        .prepare('SELECT * FROM procedural_memory WHERE skill_name = ?')
        .get(args.skill_name) as ProceduralMemoryItem;
    });
  }

  /**
   * Counts one execution and folds its outcome into the running success
   * rate: rate' = (rate * n + outcome) / (n + 1).
   */
  recordSkillExecution(input: z.input<typeof SkillExecutionInput>): ProceduralMemoryItem {
    const args = parseInput(SkillExecutionInput, input);
    return this.store.write((db) => {
      const skill = db
        .prepare('SELECT * FROM procedural_memory WHERE skill_name = ?')
        .get(args.skill_name) as ProceduralMemoryItem | undefined;
      if (!skill) throw new NotFoundError('skill', args.skill_name);

      const count = skill.execution_count + 1;
      const rate = (skill.success_rate * skill.execution_count + (args.success ? 1 : 0)) / count;
      db.prepare(
        'UPDATE procedural_memory SET execution_count = ?, success_rate = ? WHERE id = ?',
      ).run(count, rate, skill.id);

      return { ...skill, execution_count: count, success_rate: rate };
    });
  }

  // ==================== Cross-tier ====================

  /**
   * Case-insensitive substring search (ASCII case folding, as SQLite's LIKE
   * does). Tiers come back in declaration order, rows in insertion order.
   */
  search(query: string, tier: string = 'all'): SearchHit[] {
    const args = parseInput(SearchInput, { query, tier });
    const pattern = likePattern(args.query);
    const wants = (t: SearchScope) => args.tier === 'all' || args.tier === t;
    const now = isoNow(this.store);

    return this.store.read((db) => {
      const hits: SearchHit[] = [];

      if (wants('working')) {
        const rows = db
          .prepare(
            `SELECT * FROM working_memory
             WHERE expires_at > ? AND content LIKE ? ESCAPE '\\'
             ORDER BY id`,
          )
          .all(now, pattern) as WorkingMemoryItem[];
        hits.push(...rows.map((r) => ({ tier: 'working' as const, ...r })));
      }

      if (wants('episodic')) {
        const rows = db
          .prepare(
            `SELECT * FROM episodic_memory
             WHERE content LIKE ? ESCAPE '\\'
             ORDER BY id`,
          )
          .all(pattern) as EpisodicMemoryItem[];
        hits.push(...rows.map((r) => ({ tier: 'episodic' as const, ...r })));
      }

      if (wants('semantic')) {
        const rows = db
          .prepare(
            `SELECT concept, definition, confidence, created_at FROM semantic_memory
             WHERE concept LIKE ? ESCAPE '\\' OR definition LIKE ? ESCAPE '\\'
             ORDER BY id`,
          )
          .all(pattern, pattern) as SemanticMemoryItem[];
        hits.push(...rows.map((r) => ({ tier: 'semantic' as const, ...r })));
      }

      if (wants('procedural')) {
        const rows = db
          .prepare(
            `SELECT * FROM procedural_memory
             WHERE skill_name LIKE ? ESCAPE '\\' OR steps LIKE ? ESCAPE '\\'
             ORDER BY id`,
          )
          .all(pattern, pattern) as ProceduralMemoryItem[];
        hits.push(...rows.map((r) => ({ tier: 'procedural' as const, ...r })));
      }

      return hits;
    });
  }

  status(): MemoryStatus {
    const now = isoNow(this.store);
    return this.store.read((db) => {
      const count = (sql: string, ...params: string[]) =>
        (db.prepare(sql).get(...params) as { n: number }).n;

      const working = count('SELECT COUNT(*) AS n FROM working_memory WHERE expires_at > ?', now);
      const episodic = count('SELECT COUNT(*) AS n FROM episodic_memory');
      const semantic = count('SELECT COUNT(*) AS n FROM semantic_memory');
      const procedural = count('SELECT COUNT(*) AS n FROM procedural_memory');

      return {
        working,
        episodic,
        semantic,
        procedural,
        total: working + episodic + semantic + procedural,
      };
    });
  }
}
