import {
  mysqlTable,
  varchar,
  timestamp,
  text,
  longtext,
  mysqlEnum,
  json,
  uniqueIndex,
} from 'drizzle-orm/mysql-core';

/**
 * Analysis results - at most one current row per document
 */
export const analysisResults = mysqlTable(
  'analysis_results',
  {
    id: varchar('id', { length: 36 }).primaryKey(),
    documentId: varchar('document_id', { length: 36 }).notNull(),
    missingTopics: json('missing_topics').$type<string[]>().notNull(),
    summary: text('summary').notNull(),
    insights: json('insights').$type<string[]>().notNull(),
    source: mysqlEnum('source', ['retrieval', 'heuristic']).notNull(),
    analyzedAt: timestamp('analyzed_at', { fsp: 3 }).notNull(),
  },
  (table) => [uniqueIndex('uq_analysis_document_id').on(table.documentId)],
);

export type AnalysisResultRow = typeof analysisResults.$inferSelect;
export type NewAnalysisResultRow = typeof analysisResults.$inferInsert;

/**
 * Documents - owned by the document subsystem, read-only here
 */
export const documents = mysqlTable('documents', {
  id: varchar('id', { length: 36 }).primaryKey(),
  name: varchar('name', { length: 500 }).notNull(),
  status: varchar('status', { length: 50 }).notNull(),
  content: longtext('content'),
  deletedAt: timestamp('deleted_at'),
});

export type DocumentRow = typeof documents.$inferSelect;
