import type { Company, Target } from '@/types/temperature';
import type { CompanyDataProvider } from './types';

/**
 * Serves records handed to it up front. Used for fixtures and by callers
 * that already parsed their source files.
 */
export class InMemoryProvider implements CompanyDataProvider {
  readonly name = 'in_memory';

  constructor(
    private readonly companies: readonly Company[],
    private readonly targets: readonly Target[] = []
  ) {}

  async getCompanyData(companyIds: readonly string[]): Promise<Company[]> {
    const wanted = new Set(companyIds);
    return this.companies.filter((company) => wanted.has(company.companyId));
  }

  async getTargets(companyIds: readonly string[]): Promise<Target[]> {
    const wanted = new Set(companyIds);
    return this.targets.filter((target) => wanted.has(target.companyId));
  }
}
