import React, { useCallback, useMemo, useState } from 'react';
import { appRoutes, type AppRoutes } from './config';
import { useDashboardSummary } from './hooks/useDashboardSummary';
import type { SummarySource } from './services/dashboardService';
import type { ModeFilter, Street } from './types';
import { buildWorldUrl, filterStreets } from './utils/streets';
import IdentityHeader from './components/dashboard/IdentityHeader';
import StatTiles from './components/dashboard/StatTiles';
import ViewsChart from './components/dashboard/ViewsChart';
import { ActivityList, TopLikesList, TopViewsList } from './components/dashboard/RankedLists';
import StreetList from './components/dashboard/StreetList';
import StreetMap from './components/dashboard/StreetMap';

export const WINDOW_OPTIONS = [7, 30, 90];
const DEFAULT_WINDOW = 30;
const NO_STREETS: Street[] = [];

interface DashboardProps {
  routes?: AppRoutes;
  service?: SummarySource;
  navigate?: (url: string) => void;
  alert?: (message: string) => void;
  confirmDelete?: (message: string) => boolean;
}

const goTo = (url: string) => window.location.assign(url);

const Dashboard: React.FC<DashboardProps> = ({ routes = appRoutes, service, navigate = goTo, alert, confirmDelete }) => {
  const [days, setDays] = useState(DEFAULT_WINDOW);
  const [query, setQuery] = useState('');
  const [modeFilter, setModeFilter] = useState<ModeFilter>('all');
  const { summary, loading } = useDashboardSummary(days, { service, alert });

  const allStreets = summary?.streets ?? NO_STREETS;

  // Always recomputed from the full collection, never from the previous subset
  const filteredStreets = useMemo(() => filterStreets(allStreets, query, modeFilter), [allStreets, query, modeFilter]);

  const openStreet = useCallback(
    (streetId?: string) => {
      if (!streetId) return;
      const street = allStreets.find(s => s._id === streetId);
      if (!street) return;
      navigate(buildWorldUrl(street, routes));
    },
    [allStreets, navigate, routes]
  );

  return (
    <div className="min-h-screen bg-[#09090b] text-zinc-100 font-sans relative">
      <div className="absolute inset-0 pointer-events-none bg-[radial-gradient(ellipse_at_top,_var(--tw-gradient-stops))] from-blue-900/20 via-[#09090b] to-[#09090b] z-0"></div>

      <main className="relative z-10 max-w-7xl mx-auto p-5 sm:p-8 space-y-6">
        <header className="flex items-center justify-between gap-4">
          <IdentityHeader user={summary?.user} />
          <div className="flex items-center gap-3">
            {loading && (
              <div className="w-5 h-5 border-2 border-blue-500/20 border-t-blue-500 rounded-full animate-spin"></div>
            )}
            <select
              id="daysSelect"
              aria-label="Reporting window"
              value={days}
              onChange={e => setDays(parseInt(e.target.value, 10))}
              className="px-4 py-2.5 border border-zinc-800 rounded-2xl bg-zinc-900 text-zinc-300 text-sm font-bold"
            >
              {WINDOW_OPTIONS.map(option => (
                <option key={option} value={option}>
                  Last {option} days
                </option>
              ))}
            </select>
          </div>
        </header>

        <StatTiles totals={summary?.totals} />
        <ViewsChart series={summary?.views_chart} />

        <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
          <TopViewsList items={summary?.top_views} onOpen={openStreet} />
          <TopLikesList items={summary?.top_likes} onOpen={openStreet} />
          <ActivityList items={summary?.recent} onOpen={openStreet} />
        </div>

        <div className="grid grid-cols-1 lg:grid-cols-2 gap-6">
          <StreetList
            streets={filteredStreets}
            query={query}
            modeFilter={modeFilter}
            onQueryChange={setQuery}
            onModeFilterChange={setModeFilter}
            onOpen={openStreet}
            confirmDelete={confirmDelete}
          />
          <StreetMap streets={allStreets} tileUrl={routes.mapTileUrl} />
        </div>
      </main>
    </div>
  );
};

export default Dashboard;
