import React, { useCallback, useEffect, useRef, useState } from 'react';
import { toast } from 'sonner';
import { appRoutes, type AppRoutes } from './config';
import type { FrameScheduler } from './engine/DriveSession';
import { useDriveSession } from './hooks/useDriveSession';
import { SettingsStore } from './services/settingsStore';
import type { DriveSettings, Street } from './types';
import Hud from './components/drive/Hud';
import Joystick from './components/drive/Joystick';
import SettingsPanel from './components/drive/SettingsPanel';
import FullMapOverlay from './components/drive/FullMapOverlay';
import HelpModal from './components/drive/HelpModal';

export const LOADER_DELAY_MS = 600;

interface DriveWorldProps {
  streets: readonly Street[];
  selected: Street | null;
  routes?: AppRoutes;
  store?: SettingsStore;
  scheduler?: FrameScheduler;
}

const DriveWorld: React.FC<DriveWorldProps> = ({ streets, selected, routes = appRoutes, store, scheduler }) => {
  const [settingsStore] = useState(() => store ?? new SettingsStore(window.localStorage));
  const [settings, setSettings] = useState<DriveSettings>(() => settingsStore.load());
  const [mapOpen, setMapOpen] = useState(false);
  const [helpOpen, setHelpOpen] = useState(false);
  const [loaderVisible, setLoaderVisible] = useState(true);
  const [videoLoading, setVideoLoading] = useState(true);
  const videoRef = useRef<HTMLVideoElement>(null);

  const openMap = useCallback(() => setMapOpen(true), []);
  const closeMap = useCallback(() => setMapOpen(false), []);

  const { hud, controls } = useDriveSession(videoRef, { streets, selected, settings, onOpenMap: openMap, scheduler });

  useEffect(() => {
    const timer = setTimeout(() => setLoaderVisible(false), LOADER_DELAY_MS);
    return () => clearTimeout(timer);
  }, []);

  const handleSave = () => {
    settingsStore.save(settings);
    toast.success('Saved ✔');
  };

  const handleReset = () => {
    setSettings(settingsStore.reset());
    toast.success('Settings reset');
  };

  const transitioning = hud?.transitioning ?? false;
  const settingsOpen = hud?.settingsOpen ?? false;

  return (
    <div
      id="driveWorld"
      data-night={settings.night ? 'true' : 'false'}
      className={`relative w-screen h-screen overflow-hidden bg-black text-zinc-100 ${settings.night ? 'night-mode brightness-75 saturate-50' : ''}`}
    >
      <video
        id="driveVideo"
        ref={videoRef}
        playsInline
        preload="auto"
        onLoadStart={() => setVideoLoading(true)}
        onLoadedData={() => setVideoLoading(false)}
        className={`absolute inset-0 w-full h-full object-cover transition-opacity duration-200 ${transitioning ? 'opacity-0 fade-out' : 'opacity-100'}`}
        style={{ transform: `translateY(${hud?.headBob ?? 0}px)` }}
      />

      {videoLoading && streets.length > 0 && (
        <div id="videoLoading" className="absolute inset-0 flex items-center justify-center pointer-events-none">
          <div className="w-10 h-10 border-2 border-blue-500/20 border-t-blue-500 rounded-full animate-spin"></div>
        </div>
      )}

      {!streets.length && (
        <div id="noStreets" className="absolute inset-0 flex items-center justify-center text-sm text-zinc-500">
          No streets to drive yet.
        </div>
      )}

      {hud && <Hud hud={hud} />}

      <div className="absolute bottom-8 right-8 flex gap-2 z-20">
        <button
          id="pauseBtn"
          type="button"
          onClick={controls.togglePause}
          className="px-4 py-2.5 rounded-2xl bg-zinc-900/80 border border-zinc-800 text-xs font-black uppercase tracking-widest"
        >
          {hud?.paused ? 'Resume' : 'Pause'}
        </button>
        <button
          id="miniMapBtn"
          type="button"
          onClick={openMap}
          className="px-4 py-2.5 rounded-2xl bg-zinc-900/80 border border-zinc-800 text-xs font-black uppercase tracking-widest"
        >
          Map
        </button>
        <button
          id="settingsBtn"
          type="button"
          onClick={() => controls.setSettingsOpen(!settingsOpen)}
          className="px-4 py-2.5 rounded-2xl bg-zinc-900/80 border border-zinc-800 text-xs font-black uppercase tracking-widest"
        >
          Settings
        </button>
        <button
          id="helpBtn"
          type="button"
          aria-label="Help"
          onClick={() => setHelpOpen(true)}
          className="px-4 py-2.5 rounded-2xl bg-zinc-900/80 border border-zinc-800 text-xs font-black"
        >
          ?
        </button>
      </div>

      <Joystick onDirection={controls.setJoystickIntent} />

      <SettingsPanel
        open={settingsOpen}
        settings={settings}
        onChange={setSettings}
        onSave={handleSave}
        onReset={handleReset}
        onClose={() => controls.setSettingsOpen(false)}
      />

      <FullMapOverlay
        open={mapOpen}
        streets={streets}
        current={{ lat: hud?.lat ?? null, lng: hud?.lng ?? null }}
        tileUrl={routes.mapTileUrl}
        onSelect={controls.selectStreet}
        onClose={closeMap}
        onReady={controls.markMapReady}
      />

      {helpOpen && <HelpModal onClose={() => setHelpOpen(false)} />}

      {loaderVisible && (
        <div id="loadingScreen" className="absolute inset-0 z-50 flex flex-col items-center justify-center bg-black">
          <div className="w-12 h-12 border-2 border-blue-500/20 border-t-blue-500 rounded-full animate-spin"></div>
          <span className="mt-4 text-[10px] font-black text-zinc-500 uppercase tracking-[0.3em]">Loading street</span>
        </div>
      )}
    </div>
  );
};

export default DriveWorld;
