import React from 'react';
import type { ModeFilter, Street } from '../../types';
import { buildDeleteUrl, formatCount, modeOf } from '../../utils/streets';
import ModeBadge from './ModeBadge';

export const EMPTY_STREETS = 'No streets yet — upload your first one.';
export const DELETE_PROMPT = 'Delete this street? This cannot be undone.';
export const QUICK_LIST_SIZE = 20;

const MODE_OPTIONS: { value: ModeFilter; label: string }[] = [
  { value: 'all', label: 'All modes' },
  { value: 'walk', label: 'Walk' },
  { value: 'drive', label: 'Drive' },
  { value: 'fly', label: 'Fly' },
  { value: 'sit', label: 'Sit' }
];

const isModeFilter = (value: string): value is ModeFilter => MODE_OPTIONS.some(option => option.value === value);

interface StreetListProps {
  streets: Street[];
  query: string;
  modeFilter: ModeFilter;
  onQueryChange: (query: string) => void;
  onModeFilterChange: (mode: ModeFilter) => void;
  onOpen: (streetId: string) => void;
  confirmDelete?: (message: string) => boolean;
}

const windowConfirm = (message: string) => window.confirm(message);

const StreetList: React.FC<StreetListProps> = ({
  streets,
  query,
  modeFilter,
  onQueryChange,
  onModeFilterChange,
  onOpen,
  confirmDelete = windowConfirm
}) => {
  // The row is clickable, so the delete control must keep its events to itself
  const handleDeleteSubmit = (e: React.FormEvent<HTMLFormElement>) => {
    e.stopPropagation();
    if (!confirmDelete(DELETE_PROMPT)) e.preventDefault();
  };

  return (
    <section className="bg-zinc-900/40 rounded-[2rem] border border-zinc-800 p-4">
      <div className="flex flex-col sm:flex-row sm:items-center gap-3 px-2 pb-4">
        <h3 className="flex-1 text-[10px] font-black text-zinc-500 uppercase tracking-[0.3em]">Streets</h3>
        <span id="streetsMeta" className="text-[10px] font-mono text-zinc-500">
          {streets.length ? `${formatCount(streets.length)} streets shown` : ''}
        </span>
        <input
          id="streetSearch"
          type="search"
          aria-label="Search streets"
          placeholder="Search name, city, mode..."
          value={query}
          onChange={e => onQueryChange(e.target.value)}
          className="px-4 py-2.5 border border-zinc-800 rounded-2xl bg-zinc-900/40 text-zinc-300 placeholder-zinc-700 focus:outline-none focus:border-blue-500/50 text-sm"
        />
        <select
          id="modeFilter"
          aria-label="Filter by mode"
          value={modeFilter}
          onChange={e => {
            if (isModeFilter(e.target.value)) onModeFilterChange(e.target.value);
          }}
          className="px-4 py-2.5 border border-zinc-800 rounded-2xl bg-zinc-900 text-zinc-300 text-sm"
        >
          {MODE_OPTIONS.map(option => (
            <option key={option.value} value={option.value}>
              {option.label}
            </option>
          ))}
        </select>
      </div>

      <div id="streetsList" className="space-y-1">
        {!streets.length ? (
          <div className="px-4 py-3 text-xs text-zinc-600">{EMPTY_STREETS}</div>
        ) : (
          streets.slice(0, QUICK_LIST_SIZE).map(street => (
            <div
              key={street._id}
              role="button"
              tabIndex={0}
              data-open={street._id}
              onClick={() => onOpen(street._id)}
              onKeyDown={e => {
                if (e.key === 'Enter') onOpen(street._id);
              }}
              className="flex items-center gap-4 px-4 py-3 rounded-2xl hover:bg-zinc-800/50 cursor-pointer transition-all"
            >
              <div className="flex-1 min-w-0">
                <div className="text-sm font-bold text-zinc-200 truncate">{street.name || 'Untitled'}</div>
                <div className="text-[10px] text-zinc-500 truncate">
                  {(street.city || 'Unknown') + ', ' + (street.country || 'Unknown')}
                </div>
              </div>
              <ModeBadge mode={modeOf(street)} />
              <form
                method="POST"
                action={buildDeleteUrl(street._id)}
                className="m-0"
                data-delete-form="1"
                onSubmit={handleDeleteSubmit}
                onKeyDown={e => e.stopPropagation()}
              >
                <button
                  type="submit"
                  title="Delete street"
                  aria-label={`Delete ${street.name || 'street'}`}
                  onClick={e => e.stopPropagation()}
                  className="p-2 rounded-xl text-zinc-600 hover:text-red-400 hover:bg-red-500/10 transition-all active:scale-90"
                >
                  <svg className="w-4 h-4" fill="none" stroke="currentColor" viewBox="0 0 24 24">
                    <path
                      strokeLinecap="round"
                      strokeLinejoin="round"
                      strokeWidth="2"
                      d="M19 7l-.867 12.142A2 2 0 0116.138 21H7.862a2 2 0 01-1.995-1.858L5 7m5 4v6m4-6v6m1-10V4a1 1 0 00-1-1h-4a1 1 0 00-1 1v3M4 7h16"
                    />
                  </svg>
                </button>
              </form>
            </div>
          ))
        )}
      </div>
    </section>
  );
};

export default StreetList;
