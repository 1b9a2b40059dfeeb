export {
  loadRequirements,
  joinPagesWithinBudget,
  RequirementsNotFoundError,
  DEFAULT_REQUIREMENTS_BUDGET,
} from './loader.js';
export type { PageSource, LoadRequirementsOptions } from './loader.js';
export { readPdfPages } from './pdf.js';
