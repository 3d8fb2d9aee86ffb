/**
 * Exportações centralizadas dos use cases da camada application
 */
export { QueryTitlesUseCase, DEFAULT_PAGE_LIMIT } from './query-titles.use-case.js';
export { IssueTitlesUseCase } from './issue-titles.use-case.js';
export { ProcessReturnFileUseCase } from './process-return-file.use-case.js';
export { PrintTitlesUseCase } from './print-titles.use-case.js';
export { DiscardTitlesUseCase } from './discard-titles.use-case.js';
export { WriteOffTitlesUseCase } from './write-off-titles.use-case.js';
export { GenerateRemittanceUseCase } from './generate-remittance.use-case.js';
