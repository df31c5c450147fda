import { NotFoundError } from '../../utils/errors';
import type { SourceAdapter } from './provider.interface';
import { salarySourceAdapter } from './providers/salary.provider';
import { statsSourceAdapter } from './providers/stats.provider';

const adapters: SourceAdapter[] = [salarySourceAdapter, statsSourceAdapter];

export function listSourceAdapters(): string[] {
  return adapters.map((adapter) => adapter.name);
}

export function getSourceAdapter(name: string): SourceAdapter {
  const wanted = name.trim().toLowerCase();
  const adapter = adapters.find((candidate) => candidate.name === wanted);
  if (!adapter) {
    throw new NotFoundError(
      `Unknown source "${name}". Known sources: ${listSourceAdapters().join(', ')}`,
      'UNKNOWN_SOURCE'
    );
  }
  return adapter;
}
