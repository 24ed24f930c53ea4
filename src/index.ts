export * from './core/app-types';
export * from './core/errors';
export { WorklogEngine, summarizePlans, type EngineOptions, type PlanSummary } from './core/WorklogEngine';
export { WorkdaySequence, countWorkdays } from './core/workdays';
export { WeightedTaskSelector } from './core/distribution/WeightedTaskSelector';
export { WeightedRandomDistributionStrategy } from './core/distribution/WeightedRandomDistributionStrategy';
export type { DistributionStrategy } from './core/distribution/DistributionStrategy';
export { createSeededRandom, type RandomSource } from './core/random';
export { createConsoleLogger, type Logger } from './core/logger';
export { CalculationContextService } from './services/CalculationContextService';
export { JiraApiService } from './services/JiraApiService';
export { IssueProviderService } from './services/IssueProviderService';
export { JiraWorklogGateway } from './services/JiraWorklogGateway';
export { DryRunWorklogGateway } from './services/DryRunWorklogGateway';
export { WorklogSubmissionService } from './services/WorklogSubmissionService';
export { SettingsService, loadEnvFile } from './services/SettingsService';
export type { WorklogGateway } from './services/WorklogGateway';
