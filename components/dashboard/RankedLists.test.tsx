import { fireEvent, render } from '@testing-library/react';
import { describe, expect, it, vi } from 'vitest';
import { ActivityList, EMPTY_TOP_LIKES, TopLikesList, TopViewsList, describeActivity } from './RankedLists';

describe('describeActivity', () => {
  it('falls back to placeholders for missing fields', () => {
    expect(describeActivity({})).toBe('event • —');
  });

  it('joins the event, place and time', () => {
    const text = describeActivity({ eventType: 'like_street', city: 'Porto', country: 'Portugal' });
    expect(text).toBe('like_street • Porto, Portugal');
  });

  it('drops an unparseable timestamp', () => {
    expect(describeActivity({ eventType: 'view_street', city: 'Faro', timestamp: 'not-a-date' })).toBe('view_street • Faro');
  });
});

describe('ranked lists', () => {
  it('shows view counts and opens the ranked street', () => {
    const onOpen = vi.fn();
    const { container } = render(
      <TopViewsList items={[{ streetId: 's9', name: 'Harbour Run', city: 'Lisbon', views: 12, mode: 'fly' }]} onOpen={onOpen} />
    );

    const row = container.querySelector('[data-id="s9"]');
    if (!row) throw new Error('row missing');
    expect(row.textContent).toContain('12 views');

    fireEvent.click(row);
    expect(onOpen).toHaveBeenCalledWith('s9');
  });

  it('renders the empty message for an empty likes list', () => {
    const { container } = render(<TopLikesList items={[]} onOpen={vi.fn()} />);
    expect(container.querySelector('#topLikesList')?.textContent).toBe(EMPTY_TOP_LIKES);
  });

  it('opens activity rows by keyboard', () => {
    const onOpen = vi.fn();
    const { container } = render(<ActivityList items={[{ eventType: 'view_street', streetId: 'a1' }]} onOpen={onOpen} />);

    const row = container.querySelector('[data-id="a1"]');
    if (!row) throw new Error('row missing');
    fireEvent.keyDown(row, { key: 'Enter' });

    expect(onOpen).toHaveBeenCalledWith('a1');
  });
});
