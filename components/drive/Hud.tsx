import React from 'react';
import { gearKind, SPEED_ARC_LENGTH } from '../../engine/driveEngine';
import type { HudSnapshot } from '../../types';

const GEAR_CLASSES = {
  reverse: 'text-red-400 border-red-500/40 bg-red-500/10',
  neutral: 'text-zinc-400 border-zinc-700 bg-zinc-900/60',
  drive: 'text-emerald-400 border-emerald-500/40 bg-emerald-500/10'
} as const;

const Hud: React.FC<{ hud: HudSnapshot }> = ({ hud }) => {
  const kind = gearKind(hud.gear);

  return (
    <div className="absolute inset-x-0 top-0 p-5 flex items-start justify-between pointer-events-none">
      <div className="bg-black/50 backdrop-blur-md rounded-2xl border border-white/10 px-4 py-3 max-w-xs">
        <div id="hudStreetName" className="text-sm font-black truncate">
          {hud.streetName}
        </div>
        <div id="hudStreetMeta" className="text-[10px] text-zinc-400 truncate">
          {hud.streetMeta}
        </div>
      </div>

      <div className="flex items-end gap-4">
        <div className="relative w-24 h-24">
          <svg viewBox="0 0 100 100" className="w-full h-full -rotate-90">
            <circle cx="50" cy="50" r="40" fill="none" stroke="rgba(255,255,255,.08)" strokeWidth="8" />
            <circle
              id="speedArc"
              cx="50"
              cy="50"
              r="40"
              fill="none"
              stroke="#38bdf8"
              strokeWidth="8"
              strokeLinecap="round"
              strokeDasharray={SPEED_ARC_LENGTH}
              strokeDashoffset={hud.arcOffset}
            />
          </svg>
          <div className="absolute inset-0 flex flex-col items-center justify-center">
            <span id="speedValue" className="font-mono text-2xl font-black">
              {hud.speed}
            </span>
            <span className="text-[8px] text-zinc-500 uppercase tracking-widest">km/h</span>
          </div>
        </div>

        <div
          id="gearBadge"
          data-kind={kind}
          className={`w-10 h-10 rounded-xl border flex items-center justify-center font-mono font-black ${GEAR_CLASSES[kind]}`}
        >
          {hud.gear}
        </div>

        <div className="w-3 h-[70px] rounded-full bg-white/10 overflow-hidden flex items-end" title="Fuel">
          <div id="fuelBar" className="w-full bg-amber-400 rounded-full" style={{ height: `${hud.fuelHeight}px` }} />
        </div>
      </div>
    </div>
  );
};

export default Hud;
