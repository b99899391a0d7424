import { clampLimit, compact, paginate } from './pagination';

const overflowMessage = 'Offset exceeds available data';
const letters = ['a', 'b', 'c', 'd', 'e'];

describe('clampLimit', () => {
  it('keeps the limit at least one', () => {
    expect(clampLimit(0)).toBe(1);
    expect(clampLimit(-5, 100)).toBe(1);
  });

  it('caps the limit when a maximum is given', () => {
    expect(clampLimit(250, 100)).toBe(100);
    expect(clampLimit(250)).toBe(250);
  });
});

describe('compact', () => {
  it('drops nulls and keeps order', () => {
    expect(compact(['a', null, 'b'])).toEqual(['a', 'b']);
  });
});

describe('paginate', () => {
  it('slices from the offset', () => {
    const page = paginate(letters, { limit: 2, offset: 1 }, { overflowMessage });
    expect(page).toEqual({ items: ['b', 'c'], total: 5, page: 1, limit: 2, offset: 1, hasMore: true });
  });

  it('reports no more items on the last page', () => {
    expect(paginate(letters, { limit: 2, offset: 3 }, { overflowMessage }).hasMore).toBe(false);
  });

  it('combines page number and offset', () => {
    const page = paginate(letters, { page: 2, limit: 2, offset: 1 }, { overflowMessage });
    expect(page.items).toEqual(['d', 'e']);
  });

  it('treats a negative offset and page as their minimum', () => {
    const page = paginate(letters, { page: -3, limit: 1, offset: -2 }, { overflowMessage });
    expect(page.items).toEqual(['a']);
    expect(page.page).toBe(1);
    expect(page.offset).toBe(0);
  });

  it('gives consecutive disjoint slices for consecutive offsets', () => {
    const first = paginate(letters, { limit: 2, offset: 0 }, { overflowMessage });
    const second = paginate(letters, { limit: 2, offset: 2 }, { overflowMessage });
    expect([...first.items, ...second.items]).toEqual(letters.slice(0, 4));
  });

  it('returns an empty page with a message past the end', () => {
    expect(paginate(letters, { limit: 2, offset: 5 }, { overflowMessage })).toEqual({
      items: [],
      total: 5,
      page: 1,
      limit: 2,
      offset: 5,
      hasMore: false,
      message: overflowMessage,
    });
  });
});
