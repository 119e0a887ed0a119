import React, { useState } from 'react';
import type { DriveSettings } from '../../types';

type ToggleField = 'auto' | 'night' | 'shake' | 'sfx' | 'audio';

const TOGGLES: { field: ToggleField; id: string; label: string }[] = [
  { field: 'auto', id: 'toggleAutopilot', label: 'Autopilot' },
  { field: 'night', id: 'toggleNight', label: 'Night mode' },
  { field: 'shake', id: 'toggleShake', label: 'Camera shake' },
  { field: 'sfx', id: 'toggleSfx', label: 'Sound effects' },
  { field: 'audio', id: 'toggleAudio', label: 'Video audio' }
];

interface SettingsPanelProps {
  open: boolean;
  settings: DriveSettings;
  onChange: (settings: DriveSettings) => void;
  onSave: () => void;
  onReset: () => void;
  onClose: () => void;
}

async function setFullscreen(on: boolean): Promise<void> {
  if (on) {
    await document.documentElement.requestFullscreen();
  } else if (document.fullscreenElement) {
    await document.exitFullscreen();
  }
}

const SettingsPanel: React.FC<SettingsPanelProps> = ({ open, settings, onChange, onSave, onReset, onClose }) => {
  const [fullscreen, setFullscreenChecked] = useState(false);

  const toggleFullscreen = (on: boolean) => {
    setFullscreenChecked(on);
    setFullscreen(on).catch(error => {
      console.warn('Fullscreen change was refused:', error);
      setFullscreenChecked(!on);
    });
  };

  if (!open) return null;

  return (
    <aside
      id="settingsPanel"
      className="absolute top-20 right-5 w-72 bg-zinc-950/90 backdrop-blur-xl rounded-3xl border border-zinc-800 p-5 space-y-4 z-30"
    >
      <div className="flex items-center justify-between">
        <h3 className="text-[10px] font-black text-zinc-500 uppercase tracking-[0.3em]">Settings</h3>
        <button
          type="button"
          aria-label="Close settings"
          onClick={onClose}
          className="p-1.5 rounded-lg text-zinc-500 hover:text-white hover:bg-white/10"
        >
          <svg className="w-4 h-4" fill="none" stroke="currentColor" viewBox="0 0 24 24">
            <path strokeLinecap="round" strokeLinejoin="round" strokeWidth="2" d="M6 18L18 6M6 6l12 12" />
          </svg>
        </button>
      </div>

      <div className="space-y-2">
        {TOGGLES.map(toggle => (
          <label key={toggle.field} className="flex items-center justify-between text-sm text-zinc-300">
            {toggle.label}
            <input
              id={toggle.id}
              type="checkbox"
              checked={settings[toggle.field]}
              onChange={e => onChange({ ...settings, [toggle.field]: e.target.checked })}
              className="accent-blue-500"
            />
          </label>
        ))}
        <label className="flex items-center justify-between text-sm text-zinc-300">
          Fullscreen
          <input
            id="toggleFullscreen"
            type="checkbox"
            checked={fullscreen}
            onChange={e => toggleFullscreen(e.target.checked)}
            className="accent-blue-500"
          />
        </label>
      </div>

      <label className="block text-sm text-zinc-300">
        <span className="flex justify-between">
          Volume <span id="volumeValue" className="font-mono text-zinc-500">{settings.vol}%</span>
        </span>
        <input
          id="volumeSlider"
          type="range"
          min={0}
          max={100}
          value={settings.vol}
          onChange={e => onChange({ ...settings, vol: Number(e.target.value) })}
          className="w-full accent-blue-500"
        />
      </label>

      <div className="flex gap-2">
        <button
          id="resetSettings"
          type="button"
          onClick={onReset}
          className="flex-1 px-4 py-2 rounded-2xl border border-zinc-800 text-zinc-400 text-xs font-bold hover:bg-zinc-800"
        >
          Reset
        </button>
        <button
          id="saveSettings"
          type="button"
          onClick={onSave}
          className="flex-1 px-4 py-2 rounded-2xl bg-blue-600 text-white text-xs font-bold hover:bg-blue-500"
        >
          Save
        </button>
      </div>
    </aside>
  );
};

export default SettingsPanel;
