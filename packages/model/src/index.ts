export type {
  ComplexityDistribution,
  ComplexityScore,
  ComplexitySubScores,
  PageStructuralProfile,
  PartialPageProfile,
} from './page-profile';
export type {
  BusinessCategory,
  CategoryMatch,
  CategoryScore,
  SelectionLabel,
} from './category-score';
export type {
  ComplexityGatingAudit,
  PositionalTemplate,
  SelectionAudit,
  SelectionMode,
  SelectionResult,
} from './page-selection';
export type {
  BudgetCheck,
  BudgetReservation,
  BudgetStatusTier,
  BudgetWindow,
  BudgetWindowStatus,
  CostSummary,
  DailyCostSummary,
  SpendRecord,
} from './budget';
export type {
  AnalysisFailureReason,
  AnalysisMetadata,
  AnalysisQualityMetrics,
  DocumentAnalysisResult,
  DocumentScan,
  DocumentType,
  FallbackReason,
  PageAnalysisResult,
  PageAnalysisStatus,
  PageDataPoint,
  PageExtractionStatus,
  PageScanEntry,
  PageVisualAnalysis,
  RenderedPageImage,
  VisualAnalysisOutcome,
} from './page-analysis';
