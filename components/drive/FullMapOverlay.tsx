import React, { useEffect, useRef } from 'react';
import L from 'leaflet';
import type { Street } from '../../types';
import { isPlottable } from '../../utils/streets';
import { streetMarkerIcon, streetPopupHtml } from '../dashboard/StreetMap';

const WORLD_CENTER: L.LatLngTuple = [20, 0];
const STREET_ZOOM = 14;

interface FullMapOverlayProps {
  open: boolean;
  streets: readonly Street[];
  current: { lat: number | null; lng: number | null };
  tileUrl: string;
  onSelect: (index: number) => void;
  onClose: () => void;
  onReady: () => void;
}

/**
 * Street picker. The Leaflet map is only built the first time the overlay
 * opens and is kept (hidden) between opens.
 */
const FullMapOverlay: React.FC<FullMapOverlayProps> = ({ open, streets, current, tileUrl, onSelect, onClose, onReady }) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const mapRef = useRef<L.Map | null>(null);
  const handlersRef = useRef({ onSelect, onClose, onReady });

  useEffect(() => {
    handlersRef.current = { onSelect, onClose, onReady };
  }, [onSelect, onClose, onReady]);

  useEffect(() => {
    if (!open || !containerRef.current) return;

    let map = mapRef.current;
    if (!map) {
      const created = L.map(containerRef.current, { center: WORLD_CENTER, zoom: 2, attributionControl: false });
      L.tileLayer(tileUrl, { maxZoom: 20 }).addTo(created);
      streets.forEach((street, index) => {
        if (!isPlottable(street)) return;
        L.marker([street.lat, street.lng], { icon: streetMarkerIcon('#f59e0b'), title: street.name || 'Street' })
          .bindTooltip(streetPopupHtml(street))
          .on('click', () => {
            handlersRef.current.onSelect(index);
            handlersRef.current.onClose();
          })
          .addTo(created);
      });
      mapRef.current = created;
      map = created;
      handlersRef.current.onReady();
    }

    // The container was display:none while closed
    map.invalidateSize();
    if (current.lat !== null && current.lng !== null) {
      map.flyTo([current.lat, current.lng], STREET_ZOOM);
    }
  }, [open, streets, tileUrl, current.lat, current.lng]);

  useEffect(
    () => () => {
      mapRef.current?.remove();
      mapRef.current = null;
    },
    []
  );

  return (
    <div
      id="mapOverlay"
      data-open={open ? 'true' : 'false'}
      className={`absolute inset-0 z-40 bg-black/80 backdrop-blur-sm ${open ? 'block' : 'hidden'}`}
    >
      <div ref={containerRef} id="fullMap" className="absolute inset-6 rounded-3xl overflow-hidden border border-zinc-800" />
      <button
        id="closeMap"
        type="button"
        aria-label="Close map"
        onClick={onClose}
        className="absolute top-8 right-8 z-[1000] p-2.5 rounded-xl bg-zinc-900/90 border border-zinc-800 text-zinc-400 hover:text-white"
      >
        <svg className="w-5 h-5" fill="none" stroke="currentColor" viewBox="0 0 24 24">
          <path strokeLinecap="round" strokeLinejoin="round" strokeWidth="2" d="M6 18L18 6M6 6l12 12" />
        </svg>
      </button>
    </div>
  );
};

export default FullMapOverlay;
