import { clampTitle } from './title.js';

describe('clampTitle', () => {
  it('should return short titles unchanged', () => {
    expect(clampTitle('Poison Ivy Removal Cost')).toBe('Poison Ivy Removal Cost');
  });

  it('should keep a title of exactly the limit', () => {
    const title = 'a'.repeat(70);
    expect(clampTitle(title)).toBe(title);
  });

  it('should truncate long titles and append an ellipsis', () => {
    expect(clampTitle('a'.repeat(71))).toBe(`${'a'.repeat(69)}…`);
  });

  it('should strip whitespace before the ellipsis', () => {
    const title = `${'a'.repeat(68)} bbb`;
    expect(clampTitle(title)).toBe(`${'a'.repeat(68)}…`);
  });

  it('should honor a custom limit', () => {
    expect(clampTitle('Hello wonderful world', 10)).toBe('Hello won…');
  });

  it('should count code points, not UTF-16 units', () => {
    const title = '😀'.repeat(71);
    const clamped = clampTitle(title);

    expect(Array.from(clamped)).toHaveLength(70);
    expect(clamped).toBe(`${'😀'.repeat(69)}…`);
    expect(clampTitle('😀'.repeat(70))).toBe('😀'.repeat(70));
  });

  it('should return an empty string for a limit below one', () => {
    expect(clampTitle('Anything', 0)).toBe('');
  });

  it('should never exceed the limit and be idempotent', () => {
    const titles = [
      'Ivy Removal Services in Llanfairpwllgwyngyllgogerychwyrndrobwllllantysiliogogogoch, WA',
      'Poison Ivy Removal/Poison Ivy Control Services in Austin, TX',
      `${'word '.repeat(20)}end`,
      '',
    ];

    for (const max of [10, 40, 70]) {
      for (const title of titles) {
        const clamped = clampTitle(title, max);
        expect(Array.from(clamped).length).toBeLessThanOrEqual(max);
        expect(clampTitle(clamped, max)).toBe(clamped);
      }
    }
  });

  it('should clamp the long city title at 70', () => {
    expect(
      clampTitle('Ivy Removal Services in Llanfairpwllgwyngyllgogerychwyrndrobwllllantysiliogogogoch, WA')
    ).toBe('Ivy Removal Services in Llanfairpwllgwyngyllgogerychwyrndrobwllllanty…');
  });
});
