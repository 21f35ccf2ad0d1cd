/**
 * Joins portfolio holdings with provider fundamentals and targets into one
 * immutable table, so scoring never looks anything up again.
 */

import type { WarningCollector } from '@/data/quality/warnings';
import type { Company, PortfolioHolding, ProviderData, Target } from '@/types/temperature';

export interface JoinedCompany {
  companyId: string;
  company: Company | null;
  investmentValue: number;
  targets: readonly Target[];
}

export function joinPortfolio(
  providerData: ProviderData,
  portfolio: readonly PortfolioHolding[],
  warnings: WarningCollector
): readonly JoinedCompany[] {
  const companies = new Map<string, Company>();
  for (const company of providerData.fundamentalData) {
    if (companies.has(company.companyId)) {
      warnings.add({
        code: 'duplicate_company',
        companyId: company.companyId,
        message: 'Duplicate fundamentals record ignored',
      });
      continue;
    }
    companies.set(company.companyId, Object.freeze({ ...company }));
  }

  const targetsByCompany = new Map<string, Target[]>();
  for (const target of providerData.targetData) {
    const list = targetsByCompany.get(target.companyId) ?? [];
    list.push(Object.freeze({ ...target, scopes: Object.freeze([...target.scopes]) }));
    targetsByCompany.set(target.companyId, list);
  }

  const holdings = new Map<string, number>();
  for (const holding of portfolio) {
    const previous = holdings.get(holding.companyId);
    if (previous !== undefined) {
      warnings.add({
        code: 'duplicate_holding',
        companyId: holding.companyId,
        message: 'Duplicate portfolio holding merged into the first one',
      });
      holdings.set(holding.companyId, previous + holding.investmentValue);
      continue;
    }
    holdings.set(holding.companyId, holding.investmentValue);
  }

  const joined: JoinedCompany[] = [];
  for (const [companyId, investmentValue] of holdings) {
    const company = companies.get(companyId) ?? null;
    if (!company) {
      warnings.add({
        code: 'missing_company',
        companyId,
        message: 'Portfolio company missing from provider fundamentals',
      });
    }
    joined.push(
      Object.freeze({
        companyId,
        company,
        investmentValue,
        targets: Object.freeze(targetsByCompany.get(companyId) ?? []),
      })
    );
  }

  return Object.freeze(joined);
}
