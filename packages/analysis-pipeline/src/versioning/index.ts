export {
  AnalysisVersionConflictError,
  InMemoryAnalysisVersionStore,
  type AnalysisVersionStore,
  type InMemoryAnalysisVersionStoreOptions,
} from './analysis-version-store';
