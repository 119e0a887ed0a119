import React from 'react';
import type { DashboardTotals } from '../../types';
import { formatCount } from '../../utils/streets';

const TILES: { id: string; label: string; field: keyof DashboardTotals }[] = [
  { id: 'statTotal', label: 'Streets', field: 'total_streets' },
  { id: 'statLikes', label: 'Likes', field: 'total_likes' },
  { id: 'statWalk', label: 'Walk', field: 'walk_count' },
  { id: 'statDrive', label: 'Drive', field: 'drive_count' },
  { id: 'statFly', label: 'Fly', field: 'fly_count' },
  { id: 'statSit', label: 'Sit', field: 'sit_count' }
];

const StatTiles: React.FC<{ totals?: DashboardTotals }> = ({ totals }) => (
  <div className="grid grid-cols-2 sm:grid-cols-3 xl:grid-cols-6 gap-4">
    {TILES.map(tile => (
      <div key={tile.id} className="bg-zinc-900/60 rounded-3xl p-5 border border-zinc-800 backdrop-blur-md">
        <span className="block text-[9px] font-black text-zinc-600 uppercase tracking-[0.3em] mb-2">{tile.label}</span>
        <span id={tile.id} className="font-mono text-2xl font-black text-zinc-100">
          {formatCount(totals?.[tile.field])}
        </span>
      </div>
    ))}
  </div>
);

export default StatTiles;
