export { PersistencePipeline } from "./persistence-pipeline"
export type { PersistSummary, PersistencePipelineOptions } from "./persistence-pipeline"
