import { fireEvent, render } from '@testing-library/react';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import Joystick, { KNOB_TRAVEL, knobOffset } from './Joystick';

const BASE_RECT = { x: 0, y: 0, left: 0, top: 0, right: 100, bottom: 100, width: 100, height: 100, toJSON: () => ({}) };

describe('knobOffset', () => {
  it('puts the knob on its travel ring', () => {
    const { x, y } = knobOffset(3, 4);
    expect(x).toBeCloseTo(KNOB_TRAVEL * 0.6);
    expect(y).toBeCloseTo(KNOB_TRAVEL * 0.8);
  });
});

describe('Joystick', () => {
  beforeEach(() => {
    HTMLElement.prototype.setPointerCapture = vi.fn();
  });

  const setup = () => {
    const onDirection = vi.fn();
    const view = render(<Joystick onDirection={onDirection} />);
    const base = view.getByTestId('joystick');
    vi.spyOn(base, 'getBoundingClientRect').mockReturnValue(BASE_RECT);
    return { base, onDirection };
  };

  it('drives forward when pushed up past the dead zone', () => {
    const { base, onDirection } = setup();

    fireEvent.pointerDown(base, { pointerId: 1, clientX: 50, clientY: 10 });

    expect(onDirection).toHaveBeenLastCalledWith('forward');
    expect(base.setPointerCapture).toHaveBeenCalledWith(1);
    expect(base.firstElementChild?.getAttribute('style')).toContain(', -35px)');
  });

  it('reverses when dragged down and ignores moves before a press', () => {
    const { base, onDirection } = setup();

    fireEvent.pointerMove(base, { pointerId: 1, clientX: 50, clientY: 90 });
    expect(onDirection).not.toHaveBeenCalled();

    fireEvent.pointerDown(base, { pointerId: 1, clientX: 50, clientY: 50 });
    fireEvent.pointerMove(base, { pointerId: 1, clientX: 50, clientY: 90 });
    expect(onDirection).toHaveBeenLastCalledWith('reverse');
  });

  it('stays neutral inside the dead zone', () => {
    const { base, onDirection } = setup();

    fireEvent.pointerDown(base, { pointerId: 1, clientX: 50, clientY: 45 });

    expect(onDirection).toHaveBeenLastCalledWith('neutral');
  });

  it('recentres and goes neutral on release', () => {
    const { base, onDirection } = setup();
    fireEvent.pointerDown(base, { pointerId: 1, clientX: 50, clientY: 10 });

    fireEvent.pointerUp(base, { pointerId: 1 });

    expect(onDirection).toHaveBeenLastCalledWith('neutral');
    const knob = base.firstElementChild;
    expect(knob?.getAttribute('style')).toBe('transform: translate(0px, 0px);');
  });
});
