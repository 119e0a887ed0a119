import { act, renderHook, waitFor } from '@testing-library/react';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { SummarySource } from '../services/dashboardService';
import type { DashboardSummary } from '../types';
import { LOAD_FAILED_MESSAGE, useDashboardSummary } from './useDashboardSummary';

interface Deferred {
  resolve: (summary: DashboardSummary) => void;
  reject: (error: Error) => void;
}

/** Summary source whose responses the test settles by window size. */
const controlledSource = () => {
  const pending = new Map<number, Deferred>();
  const source: SummarySource = {
    fetchSummary: vi.fn(
      (days: number) =>
        new Promise<DashboardSummary>((resolve, reject) => {
          pending.set(days, { resolve, reject });
        })
    )
  };
  const settle = (days: number): Deferred => {
    const deferred = pending.get(days);
    if (!deferred) throw new Error(`no request for ${days} days`);
    return deferred;
  };
  return { source, settle };
};

describe('useDashboardSummary', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('loads the initial window', async () => {
    const { source, settle } = controlledSource();
    const alert = vi.fn();
    const { result } = renderHook(() => useDashboardSummary(30, { service: source, alert }));

    expect(result.current.loading).toBe(true);
    await act(async () => settle(30).resolve({ totals: { total_streets: 5 } }));

    expect(result.current.summary).toEqual({ totals: { total_streets: 5 } });
    expect(result.current.loading).toBe(false);
    expect(source.fetchSummary).toHaveBeenCalledWith(30);
    expect(alert).not.toHaveBeenCalled();
  });

  it('ignores a slower response from an earlier window', async () => {
    const { source, settle } = controlledSource();
    const alert = vi.fn();
    const { result, rerender } = renderHook(({ days }) => useDashboardSummary(days, { service: source, alert }), {
      initialProps: { days: 7 }
    });

    rerender({ days: 30 });
    await act(async () => settle(30).resolve({ streets: [{ _id: 'new' }] }));
    await act(async () => settle(7).resolve({ streets: [{ _id: 'old' }] }));

    expect(result.current.summary).toEqual({ streets: [{ _id: 'new' }] });
    expect(result.current.loading).toBe(false);
  });

  it('does not alert for a stale failure', async () => {
    const { source, settle } = controlledSource();
    const alert = vi.fn();
    const { result, rerender } = renderHook(({ days }) => useDashboardSummary(days, { service: source, alert }), {
      initialProps: { days: 7 }
    });

    rerender({ days: 90 });
    await act(async () => settle(7).reject(new Error('boom')));
    expect(alert).not.toHaveBeenCalled();
    expect(result.current.loading).toBe(true);

    await act(async () => settle(90).resolve({ streets: [] }));
    expect(result.current.summary).toEqual({ streets: [] });
  });

  it('alerts once on failure and keeps the previous summary', async () => {
    const { source, settle } = controlledSource();
    const alert = vi.fn();
    const { result, rerender } = renderHook(({ days }) => useDashboardSummary(days, { service: source, alert }), {
      initialProps: { days: 7 }
    });
    await act(async () => settle(7).resolve({ totals: { total_likes: 3 } }));

    rerender({ days: 30 });
    await act(async () => settle(30).reject(new Error('HTTP 500')));

    await waitFor(() => expect(result.current.loading).toBe(false));
    expect(alert).toHaveBeenCalledTimes(1);
    expect(alert).toHaveBeenCalledWith(LOAD_FAILED_MESSAGE);
    expect(result.current.summary).toEqual({ totals: { total_likes: 3 } });
  });

  it('does not refetch when handed a new alert or service for the same window', async () => {
    const { source, settle } = controlledSource();
    const { result, rerender } = renderHook(
      ({ tag }) => useDashboardSummary(30, { service: { fetchSummary: source.fetchSummary }, alert: () => tag }),
      { initialProps: { tag: 'first' } }
    );

    rerender({ tag: 'second' });
    rerender({ tag: 'third' });
    await act(async () => settle(30).resolve({ streets: [] }));

    expect(source.fetchSummary).toHaveBeenCalledTimes(1);
    expect(result.current.summary).toEqual({ streets: [] });
  });

  it('alerts through the latest handler', async () => {
    const { source, settle } = controlledSource();
    const first = vi.fn();
    const latest = vi.fn();
    const { rerender } = renderHook(({ alert }) => useDashboardSummary(30, { service: source, alert }), {
      initialProps: { alert: first }
    });

    rerender({ alert: latest });
    await act(async () => settle(30).reject(new Error('HTTP 503')));

    expect(first).not.toHaveBeenCalled();
    expect(latest).toHaveBeenCalledWith(LOAD_FAILED_MESSAGE);
  });
});
