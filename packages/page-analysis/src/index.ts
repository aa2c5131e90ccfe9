export { PageAnalysisPipeline } from './core/page-analysis-pipeline';
export type {
  CreatePageAnalysisPipelineOptions,
  ProcessDocumentOptions,
} from './core/page-analysis-pipeline';
export { DocumentScanner } from './core/document-scanner';
export type { DocumentScannerOptions } from './core/document-scanner';
export { ComplexityScorer } from './scorers/complexity-scorer';
export type { ComplexityScorerOptions } from './scorers/complexity-scorer';
export { CategoryScorer } from './scorers/category-scorer';
export { BudgetLedger, toLocalDateKey } from './budget/budget-ledger';
export type { BudgetLedgerOptions, SpendInput } from './budget/budget-ledger';
export { PageSelector } from './selectors/page-selector';
export {
  isAdmitted,
  isHighPriority,
  pagePriority,
  pageValueScore,
  rankByComplexity,
} from './selectors/complexity-ranking';
export type { ComplexityCandidate } from './selectors/complexity-ranking';
export type {
  PageSelectorOptions,
  SelectionInput,
} from './selectors/page-selector';
export { PopplerPdfReader } from './processors/poppler-pdf-reader';
export { PageRenderer, readPngDimensions } from './processors/page-renderer';
export { LLMVisualAnalyzer } from './processors/llm-visual-analyzer';
export type { LLMVisualAnalyzerOptions } from './processors/llm-visual-analyzer';
export {
  PAGE_ANALYSIS_INSTRUCTIONS,
  buildPageAnalysisPrompt,
  inferDocumentType,
} from './prompts/page-analysis-prompt';
export type {
  PageAnalysisContext,
  PageImageRenderer,
  PdfReader,
  RenderPageOptions,
  VisualAnalysisRequest,
  VisualAnalyzer,
} from './types/collaborators';
export { pageVisualAnalysisSchema } from './types/page-visual-analysis-schema';
export { loadPageAnalysisConfig } from './config/page-analysis-config';
export type { PageAnalysisConfig } from './config/page-analysis-config';
export {
  BUSINESS_CATEGORIES,
  CATEGORIES_BY_TIER,
  CATEGORY_DEFINITIONS,
  DEFAULT_CATEGORY_CAPS,
} from './config/categories';
export type { CategoryDefinition, PriorityTier } from './config/categories';
export {
  BUDGET_LEDGER,
  CATEGORY_SCORER,
  COMPLEXITY_SCORER,
  PAGE_ANALYSIS_PIPELINE,
  PAGE_RENDERING,
  PAGE_SELECTOR,
} from './config/constants';
export { ConfigurationError } from './errors/configuration-error';
export { ContractViolationError } from './errors/contract-violation-error';
export { PdfReadError } from './errors/pdf-read-error';
