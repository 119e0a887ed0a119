import React from 'react';
import type { ActivityEntry, Street, TopViewEntry } from '../../types';
import { formatCount, formatPlace } from '../../utils/streets';
import ModeBadge from './ModeBadge';

export const EMPTY_TOP_VIEWS =
  'No view events yet. Once you log "view_street" events, this will show real ranking.';
export const EMPTY_TOP_LIKES = 'No streets yet.';
export const EMPTY_ACTIVITY = 'No activity logs yet.';

type OpenHandler = (streetId?: string) => void;

interface RowProps {
  id?: string;
  title: string;
  subtitle: string;
  mode?: string;
  metric?: string;
  onOpen: OpenHandler;
}

const Row: React.FC<RowProps> = ({ id, title, subtitle, mode, metric, onOpen }) => (
  <div
    role="button"
    tabIndex={0}
    data-id={id || ''}
    onClick={() => onOpen(id)}
    onKeyDown={e => {
      if (e.key === 'Enter') onOpen(id);
    }}
    className="flex items-center gap-4 px-4 py-3 rounded-2xl hover:bg-zinc-800/50 cursor-pointer transition-all active:scale-[0.99]"
  >
    <div className="flex-1 min-w-0">
      <div className="text-sm font-bold text-zinc-200 truncate">{title}</div>
      <div className="text-[10px] text-zinc-500 truncate">{subtitle}</div>
    </div>
    <ModeBadge mode={mode} />
    <div className="w-20 text-right text-[10px] font-mono text-zinc-400">{metric}</div>
  </div>
);

const Panel: React.FC<{ id: string; title: string; children: React.ReactNode }> = ({ id, title, children }) => (
  <section className="bg-zinc-900/40 rounded-[2rem] border border-zinc-800 p-4">
    <h3 className="px-4 pt-2 pb-3 text-[10px] font-black text-zinc-500 uppercase tracking-[0.3em]">{title}</h3>
    <div id={id} className="space-y-1">
      {children}
    </div>
  </section>
);

const Empty: React.FC<{ text: string }> = ({ text }) => <div className="px-4 py-3 text-xs text-zinc-600">{text}</div>;

export const TopViewsList: React.FC<{ items?: TopViewEntry[]; onOpen: OpenHandler }> = ({ items, onOpen }) => (
  <Panel id="topViewsList" title="Most Viewed">
    {!items || !items.length ? (
      <Empty text={EMPTY_TOP_VIEWS} />
    ) : (
      items.map((item, i) => (
        <Row
          key={`${item.streetId}-${i}`}
          id={item.streetId}
          title={item.name || 'Unknown'}
          subtitle={formatPlace(item.city, item.country)}
          mode={item.mode}
          metric={`${formatCount(item.views)} views`}
          onOpen={onOpen}
        />
      ))
    )}
  </Panel>
);

export const TopLikesList: React.FC<{ items?: Street[]; onOpen: OpenHandler }> = ({ items, onOpen }) => (
  <Panel id="topLikesList" title="Most Liked">
    {!items || !items.length ? (
      <Empty text={EMPTY_TOP_LIKES} />
    ) : (
      items.map(street => (
        <Row
          key={street._id}
          id={street._id}
          title={street.name || 'Untitled'}
          subtitle={formatPlace(street.city, street.country)}
          mode={street.mode}
          metric={`♥ ${formatCount(street.likes)}`}
          onOpen={onOpen}
        />
      ))
    )}
  </Panel>
);

const formatWhen = (timestamp?: string) => {
  if (!timestamp) return '';
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? '' : date.toLocaleString();
};

export function describeActivity(entry: ActivityEntry): string {
  const place = (entry.city || '—') + (entry.country ? `, ${entry.country}` : '');
  const when = formatWhen(entry.timestamp);
  return `${entry.eventType || 'event'} • ${place}${when ? ` • ${when}` : ''}`;
}

export const ActivityList: React.FC<{ items?: ActivityEntry[]; onOpen: OpenHandler }> = ({ items, onOpen }) => (
  <Panel id="activityList" title="Recent Activity">
    {!items || !items.length ? (
      <Empty text={EMPTY_ACTIVITY} />
    ) : (
      items.map((entry, i) => (
        <Row
          key={`${entry.streetId || 'activity'}-${entry.timestamp || ''}-${i}`}
          id={entry.streetId}
          title={entry.streetName || 'Activity'}
          subtitle={describeActivity(entry)}
          mode={entry.mode}
          onOpen={onOpen}
        />
      ))
    )}
  </Panel>
);
