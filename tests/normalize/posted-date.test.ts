import { describe, it, expect } from 'vitest';
import { parsePostedDate } from '@jobscout/agents';

const scrapedAt = new Date('2024-03-10T12:00:00Z');

describe('parsePostedDate', () => {
  it('keeps the date part of ISO values', () => {
    expect(parsePostedDate('2024-03-01', scrapedAt)).toBe('2024-03-01');
    expect(parsePostedDate('2024-03-01T09:30:00-05:00', scrapedAt)).toBe('2024-03-01');
  });

  it('rejects impossible calendar dates', () => {
    expect(parsePostedDate('2024-02-30', scrapedAt)).toBeNull();
  });

  it('resolves today and yesterday against the scrape time', () => {
    expect(parsePostedDate('Today', scrapedAt)).toBe('2024-03-10');
    expect(parsePostedDate('Posted yesterday', scrapedAt)).toBe('2024-03-09');
    expect(parsePostedDate('Just posted', scrapedAt)).toBe('2024-03-10');
  });

  it('resolves relative phrases', () => {
    expect(parsePostedDate('3 days ago', scrapedAt)).toBe('2024-03-07');
    expect(parsePostedDate('a week ago', scrapedAt)).toBe('2024-03-03');
    expect(parsePostedDate('5 hours ago', scrapedAt)).toBe('2024-03-10');
    expect(parsePostedDate('30+ days ago', scrapedAt)).toBe('2024-02-09');
    expect(parsePostedDate('2 months ago', scrapedAt)).toBe('2024-01-10');
  });

  it('parses written-out dates', () => {
    expect(parsePostedDate('March 5, 2024', scrapedAt)).toBe('2024-03-05');
    expect(parsePostedDate('Posted on Sept 1st, 2023', scrapedAt)).toBe('2023-09-01');
    expect(parsePostedDate('5 Mar 2024', scrapedAt)).toBe('2024-03-05');
    expect(parsePostedDate('03/05/2024', scrapedAt)).toBe('2024-03-05');
  });

  it('returns null for missing or unrecognised text', () => {
    expect(parsePostedDate(undefined, scrapedAt)).toBeNull();
    expect(parsePostedDate('   ', scrapedAt)).toBeNull();
    expect(parsePostedDate('recently', scrapedAt)).toBeNull();
    expect(parsePostedDate('Smarch 5, 2024', scrapedAt)).toBeNull();
  });
});
