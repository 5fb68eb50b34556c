import { z } from "zod/mini"

export const userSessionDataSchema = z.object({
  userId: z.string(),
  displayName: z.string(),
  lastActiveAt: z.string(),
  subjects: z.array(z.string()),
  preferences: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])),
})

export type UserSessionData = z.infer<typeof userSessionDataSchema>

export const knowledgeNodeSchema = z.object({
  label: z.string(),
  mastery: z.number(),
})

export type KnowledgeNode = z.infer<typeof knowledgeNodeSchema>

/**
 * Concept graph built from a user's notes. Nodes are keyed by concept id;
 * `prerequisites` holds `from->to` edge ids.
 */
export const knowledgeMapGraphSchema = z.object({
  mapId: z.string(),
  nodes: z.map(z.string(), knowledgeNodeSchema),
  prerequisites: z.set(z.string()),
  builtAt: z.date(),
})

export type KnowledgeMapGraph = z.infer<typeof knowledgeMapGraphSchema>

export const analysisResultSchema = z.object({
  generatedAt: z.string(),
  metrics: z.record(z.string(), z.number()),
  insights: z.array(z.string()),
})

export type AnalysisResult = z.infer<typeof analysisResultSchema>

/** Score or hour totals per subject, e.g. `{ math: 90 }`. */
export const studyStatisticsSchema = z.record(z.string(), z.number())

export type StudyStatistics = z.infer<typeof studyStatisticsSchema>
