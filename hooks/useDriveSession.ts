import { useEffect, useMemo, useRef, useState, type RefObject } from 'react';
import { DriveSession, type FrameScheduler } from '../engine/DriveSession';
import { directionForKey } from '../engine/driveEngine';
import type { Direction, DriveSettings, HudSnapshot, Street } from '../types';

export interface DriveControls {
  selectStreet: (index: number) => void;
  setJoystickIntent: (direction: Direction) => void;
  togglePause: () => void;
  setSettingsOpen: (open: boolean) => void;
  markMapReady: () => void;
}

interface Options {
  streets: readonly Street[];
  selected: Street | null;
  settings: DriveSettings;
  onOpenMap?: () => void;
  scheduler?: FrameScheduler;
}

/**
 * Binds a DriveSession to a `<video>` element for the lifetime of the page:
 * HUD snapshots land in state, `ended` advances segments, and the document's
 * keyboard feeds the direction intent.
 */
export function useDriveSession(
  videoRef: RefObject<HTMLVideoElement | null>,
  { streets, selected, settings, onOpenMap, scheduler }: Options
) {
  const [hud, setHud] = useState<HudSnapshot | null>(null);
  const sessionRef = useRef<DriveSession | null>(null);
  const settingsRef = useRef(settings);
  const openMapRef = useRef(onOpenMap);

  useEffect(() => {
    openMapRef.current = onOpenMap;
  }, [onOpenMap]);

  useEffect(() => {
    const video = videoRef.current;
    if (!video) return;

    const session = new DriveSession({ streets, surface: video, settings: settingsRef.current, scheduler });
    sessionRef.current = session;
    const unsubscribe = session.subscribe(setHud);
    const onEnded = () => session.handleSegmentEnded();
    video.addEventListener('ended', onEnded);

    session.start(selected);
    session.run();

    return () => {
      video.removeEventListener('ended', onEnded);
      unsubscribe();
      session.dispose();
      sessionRef.current = null;
    };
  }, [videoRef, streets, selected, scheduler]);

  useEffect(() => {
    settingsRef.current = settings;
    sessionRef.current?.updateSettings(settings);
  }, [settings]);

  useEffect(() => {
    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key === 'm' || e.key === 'M') {
        openMapRef.current?.();
        return;
      }
      const session = sessionRef.current;
      if (!session) return;
      const direction = directionForKey(e.key);
      if (direction) {
        session.setKeyboardIntent(direction);
      } else if (e.key === ' ') {
        e.preventDefault();
        session.brake();
      }
    };
    const onKeyUp = (e: KeyboardEvent) => {
      if (directionForKey(e.key)) sessionRef.current?.setKeyboardIntent('neutral');
    };

    document.addEventListener('keydown', onKeyDown);
    document.addEventListener('keyup', onKeyUp);
    return () => {
      document.removeEventListener('keydown', onKeyDown);
      document.removeEventListener('keyup', onKeyUp);
    };
  }, []);

  const controls = useMemo<DriveControls>(
    () => ({
      selectStreet: index => sessionRef.current?.selectStreet(index),
      setJoystickIntent: direction => sessionRef.current?.setJoystickIntent(direction),
      togglePause: () => sessionRef.current?.togglePause(),
      setSettingsOpen: open => sessionRef.current?.setSettingsOpen(open),
      markMapReady: () => sessionRef.current?.markMapReady()
    }),
    []
  );

  return { hud, controls };
}
