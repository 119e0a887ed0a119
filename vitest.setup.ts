import { afterEach } from 'vitest';
import { cleanup } from '@testing-library/react';

// jsdom ships no ResizeObserver; recharts' ResponsiveContainer needs one to mount
class NoopResizeObserver {
  observe(): void {}
  unobserve(): void {}
  disconnect(): void {}
}

if (!('ResizeObserver' in globalThis)) {
  Object.defineProperty(globalThis, 'ResizeObserver', { value: NoopResizeObserver, writable: true });
}

// jsdom has no PointerEvent either; without it pointer events arrive without coordinates
class PointerEventShim extends MouseEvent {
  readonly pointerId: number;
  readonly pointerType: string;
  readonly isPrimary: boolean;

  constructor(type: string, init: PointerEventInit = {}) {
    super(type, init);
    this.pointerId = init.pointerId ?? 0;
    this.pointerType = init.pointerType ?? 'mouse';
    this.isPrimary = init.isPrimary ?? true;
  }
}

// fireEvent builds events from the node's own window, which is not globalThis
for (const scope of [globalThis, document.defaultView]) {
  if (scope && !('PointerEvent' in scope)) {
    Object.defineProperty(scope, 'PointerEvent', { value: PointerEventShim, writable: true, configurable: true });
  }
}

afterEach(() => {
  cleanup();
});
