import { appRoutes } from '../config';
import type { DashboardSummary } from '../types';

export interface SummarySource {
  fetchSummary(days: number): Promise<DashboardSummary>;
}

export class DashboardService implements SummarySource {
  constructor(
    private readonly summaryUrl: string = appRoutes.apiSummaryUrl,
    private readonly timeoutMs = 10000
  ) {}

  /** Aborts the request once `timeoutMs` has passed. */
  private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const id = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await fetch(url, { ...options, signal: controller.signal });
    } finally {
      clearTimeout(id);
    }
  }

  /**
   * Loads the usage summary for the last `days` days. Non-2xx responses and
   * non-object bodies reject; callers decide how to surface that.
   */
  async fetchSummary(days: number): Promise<DashboardSummary> {
    const url = `${this.summaryUrl}?days=${encodeURIComponent(days)}`;
    const response = await this.fetchWithTimeout(url, {
      method: 'GET',
      headers: { Accept: 'application/json' }
    });

    if (!response.ok) {
      throw new Error(`Failed to load dashboard data (HTTP ${response.status})`);
    }

    const payload: DashboardSummary | null = await response.json();
    if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
      throw new Error('Dashboard summary payload is not an object');
    }

    console.log(`Dashboard summary loaded: ${payload.streets?.length ?? 0} streets over ${days} days`);
    return payload;
  }
}

export const dashboardService = new DashboardService();
