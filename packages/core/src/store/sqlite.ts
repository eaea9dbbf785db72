import Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import type { CompletenessSummary } from "../pipeline.js";
import type { AggregateStat } from "../robustness/aggregator.js";
import type { EvaluationMeta, HistoryStore, SavableEvaluation, StoredEvaluation } from "./history.js";

interface EvaluationRow {
  id: string;
  label: string;
  created_at: string;
  summary: string;
}

interface AggregateRow {
  data: string;
}

export class SqliteHistoryStore implements HistoryStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS evaluations (
        id         TEXT PRIMARY KEY,
        label      TEXT NOT NULL,
        created_at TEXT NOT NULL,
        summary    TEXT NOT NULL,
        meta       TEXT
      );
      CREATE TABLE IF NOT EXISTS aggregates (
        id            TEXT PRIMARY KEY,
        evaluation_id TEXT NOT NULL REFERENCES evaluations(id) ON DELETE CASCADE,
        architecture  TEXT NOT NULL,
        condition     TEXT NOT NULL,
        data          TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_aggregates_evaluation_id ON aggregates(evaluation_id);
      CREATE INDEX IF NOT EXISTS idx_evaluations_label ON evaluations(label);
    `);
  }

  saveEvaluation(label: string, evaluation: SavableEvaluation, extraMeta?: Record<string, unknown>): EvaluationMeta {
    const id = randomUUID();
    const now = new Date().toISOString();
    const aggregates = [...evaluation.aggregates];

    const insertEvaluation = this.db.prepare<[string, string, string, string, string | null]>(
      "INSERT INTO evaluations (id, label, created_at, summary, meta) VALUES (?, ?, ?, ?, ?)"
    );
    const insertAggregate = this.db.prepare<[string, string, string, string, string]>(
      "INSERT INTO aggregates (id, evaluation_id, architecture, condition, data) VALUES (?, ?, ?, ?, ?)"
    );

    const transaction = this.db.transaction(() => {
      insertEvaluation.run(id, label, now, JSON.stringify(evaluation.summary), extraMeta ? JSON.stringify(extraMeta) : null);
      for (const stat of aggregates) {
        insertAggregate.run(randomUUID(), id, stat.architecture, stat.condition, JSON.stringify(stat));
      }
    });
    transaction();

    return { id, label, createdAt: now, groupCount: aggregates.length, summary: evaluation.summary };
  }

  loadEvaluation(id: string): StoredEvaluation | null {
    const row = this.db
      .prepare<[string], EvaluationRow>("SELECT id, label, created_at, summary FROM evaluations WHERE id = ?")
      .get(id);
    if (!row) return null;

    const aggregates: AggregateStat[] = this.db
      .prepare<[string], AggregateRow>(
        "SELECT data FROM aggregates WHERE evaluation_id = ? ORDER BY architecture, condition"
      )
      .all(id)
      .map((r) => JSON.parse(r.data));

    return { meta: this.toMeta(row, aggregates.length), aggregates };
  }

  loadByLabel(label: string): StoredEvaluation | null {
    const row = this.db
      .prepare<[string], { id: string }>(
        "SELECT id FROM evaluations WHERE label = ? ORDER BY created_at DESC, rowid DESC LIMIT 1"
      )
      .get(label);
    if (!row) return null;
    return this.loadEvaluation(row.id);
  }

  listLabels(): string[] {
    return this.db
      .prepare<[], { label: string }>(
        "SELECT label FROM evaluations GROUP BY label ORDER BY MAX(created_at) DESC, MAX(rowid) DESC"
      )
      .all()
      .map((r) => r.label);
  }

  close(): void {
    this.db.close();
  }

  private toMeta(row: EvaluationRow, groupCount: number): EvaluationMeta {
    const summary: CompletenessSummary = JSON.parse(row.summary);
    return {
      id: row.id,
      label: row.label,
      createdAt: row.created_at,
      groupCount,
      summary,
    };
  }
}
