import { fireEvent, render, waitFor } from '@testing-library/react';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import Dashboard from './Dashboard';
import { DEFAULT_ROUTES } from './config';
import type { SummarySource } from './services/dashboardService';
import type { DashboardSummary } from './types';
import { DELETE_PROMPT, EMPTY_STREETS } from './components/dashboard/StreetList';
import { EMPTY_ACTIVITY, EMPTY_TOP_VIEWS } from './components/dashboard/RankedLists';

vi.mock('./components/dashboard/StreetMap', () => ({
  default: () => null
}));

const SUMMARY: DashboardSummary = {
  user: { name: 'ana', email: 'ana@example.test', role: 'admin' },
  totals: { total_streets: 5, total_likes: 12, walk_count: 2, drive_count: 1, fly_count: 1, sit_count: 1 },
  views_chart: { labels: ['2024-01-01', '2024-01-02'], data: [10, 20] },
  top_views: [{ streetId: 'xyz', name: 'Harbour Run', city: 'Lisbon', country: 'Portugal', mode: 'fly', views: 9 }],
  top_likes: [],
  recent: [],
  streets: [
    { _id: 'abc', name: 'Old Town', city: 'Porto', country: 'Portugal', type: '3d', mode: 'walk' },
    { _id: 'xyz', name: 'Harbour Run', city: 'Lisbon', country: 'Portugal', type: 'video', mode: 'fly' }
  ]
};

const sourceOf = (summary: DashboardSummary): SummarySource => ({
  fetchSummary: vi.fn(async () => summary)
});

const renderDashboard = (summary: DashboardSummary = SUMMARY) => {
  const service = sourceOf(summary);
  const navigate = vi.fn();
  const alert = vi.fn();
  const confirmDelete = vi.fn(() => false);
  const view = render(
    <Dashboard routes={DEFAULT_ROUTES} service={service} navigate={navigate} alert={alert} confirmDelete={confirmDelete} />
  );
  const byId = (id: string) => {
    const el = view.container.querySelector(`#${id}`);
    if (!el) throw new Error(`#${id} not rendered`);
    return el;
  };
  return { ...view, service, navigate, alert, confirmDelete, byId };
};

describe('Dashboard', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  it('renders totals and the views total for the default window', async () => {
    const { byId, service } = renderDashboard();

    await waitFor(() => expect(byId('statTotal').textContent).toBe('5'));
    expect(byId('statLikes').textContent).toBe('12');
    expect(byId('viewsMeta').textContent).toBe('30 views in range');
    expect(byId('userName').textContent).toBe('ana');
    expect(byId('adminBadge').textContent).toBe('Admin');
    expect(service.fetchSummary).toHaveBeenCalledWith(30);
  });

  it('shows the empty messages for missing lists', async () => {
    const { byId } = renderDashboard({ totals: { total_streets: 0 } });

    await waitFor(() => expect(byId('statTotal').textContent).toBe('0'));
    expect(byId('topViewsList').textContent).toBe(EMPTY_TOP_VIEWS);
    expect(byId('activityList').textContent).toBe(EMPTY_ACTIVITY);
    expect(byId('streetsList').textContent).toBe(EMPTY_STREETS);
    expect(byId('streetsMeta').textContent).toBe('');
  });

  it('reloads when the window changes', async () => {
    const { byId, service } = renderDashboard();
    await waitFor(() => expect(byId('statTotal').textContent).toBe('5'));

    fireEvent.change(byId('daysSelect'), { target: { value: '7' } });

    await waitFor(() => expect(service.fetchSummary).toHaveBeenCalledWith(7));
  });

  it('filters the street list by mode and query', async () => {
    const { byId } = renderDashboard();
    await waitFor(() => expect(byId('streetsMeta').textContent).toBe('2 streets shown'));

    fireEvent.change(byId('modeFilter'), { target: { value: 'fly' } });
    expect(byId('streetsMeta').textContent).toBe('1 streets shown');

    fireEvent.change(byId('modeFilter'), { target: { value: 'all' } });
    fireEvent.change(byId('streetSearch'), { target: { value: 'PORTO' } });
    expect(byId('streetsMeta').textContent).toBe('1 streets shown');
    expect(byId('streetsList').querySelector('[data-open]')?.getAttribute('data-open')).toBe('abc');
  });

  it('shows the empty message when no street matches the mode', async () => {
    const driveOnly: DashboardSummary = {
      streets: [
        { _id: 'd1', name: 'Coast Road', mode: 'drive' },
        { _id: 'd2', name: 'Ring Road', mode: 'drive' }
      ]
    };
    const { byId } = renderDashboard(driveOnly);
    await waitFor(() => expect(byId('streetsMeta').textContent).toBe('2 streets shown'));

    fireEvent.change(byId('modeFilter'), { target: { value: 'fly' } });

    expect(byId('streetsList').textContent).toBe(EMPTY_STREETS);
  });

  it('navigates to the world matching the street type and mode', async () => {
    const { byId, navigate } = renderDashboard();
    await waitFor(() => expect(byId('streetsMeta').textContent).toBe('2 streets shown'));

    const abc = byId('streetsList').querySelector('[data-open="abc"]');
    if (!abc) throw new Error('row missing');
    fireEvent.click(abc);
    expect(navigate).toHaveBeenLastCalledWith('/world/3d?street_id=abc');

    const ranked = byId('topViewsList').querySelector('[data-id="xyz"]');
    if (!ranked) throw new Error('ranked row missing');
    fireEvent.click(ranked);
    expect(navigate).toHaveBeenLastCalledWith('/world/fly?street_id=xyz');
  });

  it('does not navigate from the delete control', async () => {
    const { byId, navigate, confirmDelete } = renderDashboard();
    await waitFor(() => expect(byId('streetsMeta').textContent).toBe('2 streets shown'));

    const button = byId('streetsList').querySelector('[data-open="abc"] button');
    if (!button) throw new Error('delete button missing');
    fireEvent.click(button);

    expect(navigate).not.toHaveBeenCalled();
    expect(confirmDelete).toHaveBeenCalledWith(DELETE_PROMPT);
  });

  it('does not navigate when Enter is pressed on the delete control', async () => {
    const { byId, navigate } = renderDashboard();
    await waitFor(() => expect(byId('streetsMeta').textContent).toBe('2 streets shown'));

    const button = byId('streetsList').querySelector('[data-open="abc"] button');
    if (!button) throw new Error('delete button missing');
    fireEvent.keyDown(button, { key: 'Enter' });

    expect(navigate).not.toHaveBeenCalled();
  });

  it('still opens a row from the keyboard', async () => {
    const { byId, navigate } = renderDashboard();
    await waitFor(() => expect(byId('streetsMeta').textContent).toBe('2 streets shown'));

    const row = byId('streetsList').querySelector('[data-open="xyz"]');
    if (!row) throw new Error('row missing');
    fireEvent.keyDown(row, { key: 'Enter' });

    expect(navigate).toHaveBeenCalledWith('/world/fly?street_id=xyz');
  });

  it('cancels the delete submission when the prompt is declined', async () => {
    const { byId, confirmDelete } = renderDashboard();
    await waitFor(() => expect(byId('streetsMeta').textContent).toBe('2 streets shown'));

    const form = byId('streetsList').querySelector('[data-open="abc"] form');
    if (!form) throw new Error('delete form missing');
    expect(form.getAttribute('action')).toBe('/street/abc/delete');

    expect(fireEvent.submit(form)).toBe(false);

    confirmDelete.mockReturnValue(true);
    expect(fireEvent.submit(form)).toBe(true);
  });
});
