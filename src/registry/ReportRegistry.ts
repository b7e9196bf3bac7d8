/**
 * ReportRegistry
 *
 * Function identity -> accumulating record, created on first sight.
 * Insertion order is kept in a separate list so sorting starts from a
 * stable ordering.
 */

import { formatTitle, identityKey, resolveCallSite } from '../identity/FunctionIdentity.js';
import { sortReports } from '../aggregation/ReportSorter.js';
import type { CallSiteMetadata, FunctionReport, SortMethod } from '../core/types.js';

export class ReportRegistry {
  private byKey: Map<string, FunctionReport> = new Map();
  private ordered: FunctionReport[] = [];

  /**
   * Get the record for a call site, creating a zero-valued one if needed
   */
  getOrCreate(metadata: CallSiteMetadata): FunctionReport {
    const site = resolveCallSite(metadata);
    const key = identityKey(site);

    let report = this.byKey.get(key);
    if (!report) {
      report = {
        key,
        title: formatTitle(site),
        callCount: 0,
        duration: 0,
        startedAt: undefined,
        depth: 0
      };
      this.byKey.set(key, report);
      this.ordered.push(report);
    }
    return report;
  }

  get(metadata: CallSiteMetadata): FunctionReport | undefined {
    return this.byKey.get(identityKey(resolveCallSite(metadata)));
  }

  get reports(): readonly FunctionReport[] {
    return this.ordered;
  }

  get size(): number {
    return this.ordered.length;
  }

  sortBy(method: SortMethod): readonly FunctionReport[] {
    return sortReports(this.ordered, method);
  }

  /**
   * Return every record to Idle, dropping activations whose return was never
   * delivered
   */
  clearInFlight(): void {
    for (const report of this.ordered) {
      report.depth = 0;
      report.startedAt = undefined;
    }
  }

  reset(): void {
    this.byKey = new Map();
    this.ordered = [];
  }
}
