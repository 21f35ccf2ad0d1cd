import { createChildLogger } from '@/utils/logger';
import type { Company, PortfolioHolding, ProviderData, Target } from '@/types/temperature';
import type { CompanyDataProvider } from './types';

const logger = createChildLogger('providers');

/**
 * Fetches fundamentals and targets for every portfolio company. With several
 * providers the first one that returns a company wins; targets are
 * concatenated in provider order.
 */
export async function loadProviderData(
  providers: readonly CompanyDataProvider[],
  portfolio: readonly PortfolioHolding[]
): Promise<ProviderData> {
  if (providers.length === 0) {
    throw new Error('provider_missing: at least one data provider is required');
  }

  const companyIds = [...new Set(portfolio.map((holding) => holding.companyId))];
  const responses = await Promise.all(
    providers.map(async (provider) => {
      const [companies, targets] = await Promise.all([
        provider.getCompanyData(companyIds),
        provider.getTargets(companyIds),
      ]);
      logger.debug(
        { provider: provider.name, companies: companies.length, targets: targets.length },
        'Provider data loaded'
      );
      return { companies, targets };
    })
  );

  const seen = new Set<string>();
  const fundamentalData: Company[] = [];
  const targetData: Target[] = [];
  for (const { companies, targets } of responses) {
    for (const company of companies) {
      if (seen.has(company.companyId)) continue;
      seen.add(company.companyId);
      fundamentalData.push(company);
    }
    targetData.push(...targets);
  }

  return { fundamentalData, targetData };
}
