import React from 'react';

const MODE_STYLES: Record<string, string> = {
  walk: 'bg-emerald-600/10 text-emerald-400 border-emerald-500/20',
  drive: 'bg-blue-600/10 text-blue-400 border-blue-500/20',
  fly: 'bg-fuchsia-600/10 text-fuchsia-400 border-fuchsia-500/20',
  sit: 'bg-amber-600/10 text-amber-400 border-amber-500/20'
};

const ModeBadge: React.FC<{ mode?: string }> = ({ mode }) => {
  const m = (mode || 'walk').toLowerCase();
  return (
    <span
      data-mode={m}
      className={`px-2.5 py-1 rounded-lg border text-[9px] font-black uppercase tracking-widest ${MODE_STYLES[m] ?? 'bg-zinc-800 text-zinc-400 border-zinc-700'}`}
    >
      {m.toUpperCase()}
    </span>
  );
};

export default ModeBadge;
