import React, { useRef, useState } from 'react';
import { joystickDirection } from '../../engine/driveEngine';
import type { Direction } from '../../types';

export const KNOB_TRAVEL = 35;

/** The knob always sits on its travel ring, pointing the way the finger pulls. */
export function knobOffset(dx: number, dy: number): { x: number; y: number } {
  const angle = Math.atan2(dy, dx);
  return { x: Math.cos(angle) * KNOB_TRAVEL, y: Math.sin(angle) * KNOB_TRAVEL };
}

interface JoystickProps {
  onDirection: (direction: Direction) => void;
}

const Joystick: React.FC<JoystickProps> = ({ onDirection }) => {
  const activeRef = useRef(false);
  const [offset, setOffset] = useState({ x: 0, y: 0 });

  const move = (event: React.PointerEvent<HTMLDivElement>) => {
    const rect = event.currentTarget.getBoundingClientRect();
    const dx = event.clientX - (rect.left + rect.width / 2);
    const dy = event.clientY - (rect.top + rect.height / 2);
    setOffset(knobOffset(dx, dy));
    onDirection(joystickDirection(dx, dy, rect.width / 2));
  };

  const handlePointerDown = (event: React.PointerEvent<HTMLDivElement>) => {
    activeRef.current = true;
    event.currentTarget.setPointerCapture(event.pointerId);
    move(event);
  };

  const handlePointerMove = (event: React.PointerEvent<HTMLDivElement>) => {
    if (activeRef.current) move(event);
  };

  const release = () => {
    activeRef.current = false;
    setOffset({ x: 0, y: 0 });
    onDirection('neutral');
  };

  return (
    <div
      id="joystickBase"
      data-testid="joystick"
      onPointerDown={handlePointerDown}
      onPointerMove={handlePointerMove}
      onPointerUp={release}
      onPointerCancel={release}
      className="absolute bottom-8 left-8 w-28 h-28 rounded-full bg-white/5 border border-white/10 backdrop-blur-md touch-none select-none"
    >
      <div
        id="joystickKnob"
        className="absolute left-1/2 top-1/2 -ml-6 -mt-6 w-12 h-12 rounded-full bg-white/20 border border-white/30"
        style={{ transform: `translate(${offset.x}px, ${offset.y}px)` }}
      />
    </div>
  );
};

export default Joystick;
