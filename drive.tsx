import React from 'react';
import { createRoot } from 'react-dom/client';
import { Toaster } from 'sonner';
import 'leaflet/dist/leaflet.css';
import DriveWorld from './DriveWorld';
import { readDriveBootstrap } from './config';

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error('Could not find root element to mount to');
}

const { routes, streets, selected } = readDriveBootstrap();

createRoot(rootElement).render(
  <React.StrictMode>
    <DriveWorld streets={streets} selected={selected} routes={routes} />
    <Toaster theme="dark" position="top-center" richColors />
  </React.StrictMode>
);
