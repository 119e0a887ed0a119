import React, { useEffect, useRef } from 'react';
import L from 'leaflet';
import type { Street } from '../../types';
import { escapeHtml, formatPlace, plottableStreets } from '../../utils/streets';

interface StreetMapProps {
  streets: Street[];
  tileUrl: string;
}

const DEFAULT_CENTER: L.LatLngTuple = [25.2048, 55.2708];
const FIT_PADDING: L.PointTuple = [40, 40];
const FIT_MAX_ZOOM = 7;

export const streetMarkerIcon = (color = '#38bdf8') =>
  L.divIcon({
    html: `<div class="w-4 h-4 rounded-full border-2 border-white/20 shadow-xl" style="background-color: ${color}"></div>`,
    className: 'street-marker',
    iconSize: [16, 16],
    iconAnchor: [8, 8]
  });

export function streetPopupHtml(street: Street): string {
  return `<div class="text-[12px] leading-relaxed">
    <b>${escapeHtml(street.name || 'Untitled')}</b><br/>
    ${escapeHtml(formatPlace(street.city, street.country))}<br/>
    <span class="opacity-80">${escapeHtml((street.type || '').toUpperCase())} ${escapeHtml((street.mode || '').toUpperCase())}</span>
  </div>`;
}

/**
 * Dashboard map. The Leaflet instance lives as long as the component; each new
 * street collection replaces the marker layer and refits the viewport.
 */
const StreetMap: React.FC<StreetMapProps> = ({ streets, tileUrl }) => {
  const containerRef = useRef<HTMLDivElement>(null);
  const mapRef = useRef<L.Map | null>(null);
  const markersRef = useRef<L.LayerGroup | null>(null);

  useEffect(() => {
    if (!containerRef.current || mapRef.current) return;
    const map = L.map(containerRef.current, {
      center: DEFAULT_CENTER,
      zoom: 2,
      attributionControl: false
    });
    L.tileLayer(tileUrl, { maxZoom: 20 }).addTo(map);
    mapRef.current = map;
    markersRef.current = L.layerGroup().addTo(map);

    return () => {
      map.remove();
      mapRef.current = null;
      markersRef.current = null;
    };
  }, [tileUrl]);

  useEffect(() => {
    const map = mapRef.current;
    const layer = markersRef.current;
    if (!map || !layer) return;

    layer.clearLayers();
    const points = plottableStreets(streets);
    points.forEach(street => {
      L.marker([street.lat, street.lng], { icon: streetMarkerIcon() })
        .bindPopup(streetPopupHtml(street), { closeButton: true })
        .addTo(layer);
    });

    if (points.length >= 2) {
      const bounds = L.latLngBounds(points.map((p): L.LatLngTuple => [p.lat, p.lng]));
      map.fitBounds(bounds, { padding: FIT_PADDING, maxZoom: FIT_MAX_ZOOM });
    }
  }, [streets, tileUrl]);

  return (
    <section className="bg-zinc-900/40 rounded-[2rem] border border-zinc-800 overflow-hidden">
      <div id="map" ref={containerRef} className="w-full h-80" />
    </section>
  );
};

export default StreetMap;
