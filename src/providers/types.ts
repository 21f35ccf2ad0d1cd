/**
 * Shared types and interfaces for company data providers.
 *
 * Providers supply the temperature score engine with fundamentals and
 * emission-reduction targets while hiding the underlying source (a vendor
 * feed, a spreadsheet export, a database). Parsing those sources happens
 * behind this interface.
 */
import type { Company, Target } from '@/types/temperature';

export interface CompanyDataProvider {
  readonly name: string;
  getCompanyData(companyIds: readonly string[]): Promise<Company[]>;
  getTargets(companyIds: readonly string[]): Promise<Target[]>;
}
