export type { SourceAdapter, SourceParseReport } from './provider.interface';
export { TabularSourceAdapter, type SourceRow } from './tabularSource';
export { SalarySourceAdapter, salarySourceAdapter } from './providers/salary.provider';
export { StatsSourceAdapter, statsSourceAdapter } from './providers/stats.provider';
export { getSourceAdapter, listSourceAdapters } from './factory';
