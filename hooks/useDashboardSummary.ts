import { useCallback, useEffect, useRef, useState } from 'react';
import { dashboardService, type SummarySource } from '../services/dashboardService';
import type { DashboardSummary } from '../types';

export const LOAD_FAILED_MESSAGE = 'Failed to load dashboard data.';

const windowAlert = (message: string) => window.alert(message);

interface Options {
  service?: SummarySource;
  alert?: (message: string) => void;
}

/**
 * Loads the summary for `days` and reloads whenever it changes. Each load takes
 * a token; a response (or failure) that is no longer the latest is dropped, so
 * a slow earlier window can never overwrite a newer one.
 */
export function useDashboardSummary(days: number, { service = dashboardService, alert = windowAlert }: Options = {}) {
  const [summary, setSummary] = useState<DashboardSummary | null>(null);
  const [loading, setLoading] = useState(true);
  const tokenRef = useRef(0);
  const serviceRef = useRef(service);
  const alertRef = useRef(alert);

  useEffect(() => {
    serviceRef.current = service;
    alertRef.current = alert;
  }, [service, alert]);

  const load = useCallback(async (windowDays: number) => {
    const token = ++tokenRef.current;
    setLoading(true);
    try {
      const data = await serviceRef.current.fetchSummary(windowDays);
      if (token !== tokenRef.current) {
        console.log(`Dropping stale dashboard response for ${windowDays} days`);
        return;
      }
      setSummary(data);
    } catch (error) {
      if (token !== tokenRef.current) {
        console.warn(`Stale dashboard request for ${windowDays} days failed`, error);
        return;
      }
      console.error('Dashboard load failed:', error);
      alertRef.current(LOAD_FAILED_MESSAGE);
    } finally {
      if (token === tokenRef.current) setLoading(false);
    }
  }, []);

  useEffect(() => {
    void load(days);
  }, [days, load]);

  useEffect(
    () => () => {
      // Invalidate whatever is still in flight when the dashboard unmounts
      tokenRef.current++;
    },
    []
  );

  return { summary, loading };
}
