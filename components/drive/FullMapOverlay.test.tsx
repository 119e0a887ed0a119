import { render } from '@testing-library/react';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { Street } from '../../types';
import FullMapOverlay from './FullMapOverlay';

interface FakeMarker {
  bindTooltip: () => FakeMarker;
  on: (event: string, handler: () => void) => FakeMarker;
  addTo: () => FakeMarker;
}

const leaflet = vi.hoisted(() => {
  const map = { invalidateSize: vi.fn(), flyTo: vi.fn(), remove: vi.fn() };
  const markers: { latLng: [number, number]; click?: () => void }[] = [];
  const L = {
    map: vi.fn(() => map),
    tileLayer: vi.fn(() => ({ addTo: vi.fn() })),
    divIcon: vi.fn(() => ({})),
    marker: vi.fn((latLng: [number, number]) => {
      const entry: { latLng: [number, number]; click?: () => void } = { latLng };
      markers.push(entry);
      const marker: FakeMarker = {
        bindTooltip: () => marker,
        on: (_event, handler) => {
          entry.click = handler;
          return marker;
        },
        addTo: () => marker
      };
      return marker;
    })
  };
  return { L, map, markers };
});

vi.mock('leaflet', () => ({ default: leaflet.L }));

const STREETS: Street[] = [
  { _id: 'a', name: 'Coast Road', lat: 37.01, lng: -7.93 },
  { _id: 'b', name: 'Unmapped Lane' },
  { _id: 'c', name: 'Ring Road', lat: 41.55, lng: -8.42 }
];

describe('FullMapOverlay', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    leaflet.markers.length = 0;
  });

  const setup = (open: boolean) => {
    const handlers = { onSelect: vi.fn(), onClose: vi.fn(), onReady: vi.fn() };
    const props = { streets: STREETS, current: { lat: 37.01, lng: -7.93 }, tileUrl: 'https://tiles.test/{z}/{x}/{y}.png' };
    const view = render(<FullMapOverlay open={open} {...props} {...handlers} />);
    const reopen = (next: boolean) => view.rerender(<FullMapOverlay open={next} {...props} {...handlers} />);
    return { ...view, handlers, reopen };
  };

  it('does not build the map until first opened', () => {
    const { container } = setup(false);

    expect(leaflet.L.map).not.toHaveBeenCalled();
    expect(container.querySelector('#mapOverlay')?.getAttribute('data-open')).toBe('false');
  });

  it('plots only streets with coordinates and eases to the current one', () => {
    const { handlers } = setup(true);

    expect(leaflet.L.map).toHaveBeenCalledTimes(1);
    expect(leaflet.markers.map(m => m.latLng)).toEqual([
      [37.01, -7.93],
      [41.55, -8.42]
    ]);
    expect(handlers.onReady).toHaveBeenCalledTimes(1);
    expect(leaflet.map.invalidateSize).toHaveBeenCalledTimes(1);
    expect(leaflet.map.flyTo).toHaveBeenCalledWith([37.01, -7.93], 14);
  });

  it('reuses the map on later opens', () => {
    const { reopen, handlers } = setup(true);

    reopen(false);
    reopen(true);

    expect(leaflet.L.map).toHaveBeenCalledTimes(1);
    expect(handlers.onReady).toHaveBeenCalledTimes(1);
    expect(leaflet.map.invalidateSize).toHaveBeenCalledTimes(2);
  });

  it('selects the clicked street by its index in the full collection', () => {
    const { handlers } = setup(true);

    leaflet.markers[1].click?.();

    expect(handlers.onSelect).toHaveBeenCalledWith(2);
    expect(handlers.onClose).toHaveBeenCalledTimes(1);
  });

  it('removes the map on unmount', () => {
    const { unmount } = setup(true);

    unmount();

    expect(leaflet.map.remove).toHaveBeenCalledTimes(1);
  });
});
