export { agentGoalAccuracy } from "./agent-goal-accuracy.ts";
export { answerAccuracy } from "./answer-accuracy.ts";
export { answerCorrectness, normalizeWeights } from "./answer-correctness.ts";
export { aspectCritic } from "./aspect-critic.ts";
export { contextEntityRecall, matchEntities } from "./context-entity-recall.ts";
export { contextPrecision, precisionAtK } from "./context-precision.ts";
export { contextRecall } from "./context-recall.ts";
export { contextRelevance } from "./context-relevance.ts";
export { factualCorrectness } from "./factual-correctness.ts";
export { faithfulness } from "./faithfulness.ts";
export { bleu, chrf, rouge, stringSimilarity } from "./nlp.ts";
export { noiseSensitivity } from "./noise-sensitivity.ts";
export { responseGroundedness } from "./response-groundedness.ts";
export { responseRelevancy } from "./response-relevancy.ts";
export { parseRubricLevels, rubrics, selectLevel } from "./rubrics.ts";
export { semanticSimilarity } from "./semantic-similarity.ts";
export { simpleCriteria } from "./simple-criteria.ts";
export { toolCallAccuracy } from "./tool-call-accuracy.ts";
export { coveredReferenceTopics, topicAdherence } from "./topic-adherence.ts";
export type { ExtractionInput, FamilyExtractor } from "./shared.ts";
