export const USER_CATEGORY = "user"
export const KNOWLEDGE_MAP_CATEGORY = "knowledge_map"
export const STUDY_STATS_CATEGORY = "study_stats"

const ANALYSIS_CATEGORY = "analysis"

/** `analysis:{type}`, e.g. `analysis:trend`. */
export function analysisCategory(analysisType: string): string {
  return `${ANALYSIS_CATEGORY}:${analysisType}`
}

/** Category pattern covering every analysis type. */
export const ANY_ANALYSIS_CATEGORY = analysisCategory("*")
