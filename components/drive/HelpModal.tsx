import React from 'react';

const CONTROLS: [string, string][] = [
  ['↑ / W', 'Drive forward'],
  ['↓ / S', 'Reverse'],
  ['Space', 'Brake'],
  ['M', 'Open the street map'],
  ['Joystick', 'Push up to drive, down to reverse']
];

const HelpModal: React.FC<{ onClose: () => void }> = ({ onClose }) => (
  <div
    id="helpModal"
    role="dialog"
    aria-modal="true"
    aria-labelledby="helpTitle"
    className="fixed inset-0 z-50 flex items-center justify-center p-6 bg-black/70 backdrop-blur-sm"
    onClick={onClose}
  >
    <div
      className="w-full max-w-sm bg-zinc-950 rounded-3xl border border-zinc-800 p-6 space-y-4"
      onClick={e => e.stopPropagation()}
    >
      <h2 id="helpTitle" className="text-sm font-black uppercase tracking-[0.3em] text-zinc-400">
        Controls
      </h2>
      <dl className="space-y-2">
        {CONTROLS.map(([keys, action]) => (
          <div key={keys} className="flex justify-between text-sm">
            <dt className="font-mono text-zinc-200">{keys}</dt>
            <dd className="text-zinc-500">{action}</dd>
          </div>
        ))}
      </dl>
      <button
        id="helpGotIt"
        type="button"
        onClick={onClose}
        className="w-full px-4 py-2.5 rounded-2xl bg-blue-600 text-white text-xs font-black uppercase tracking-widest"
      >
        Got it
      </button>
    </div>
  </div>
);

export default HelpModal;
