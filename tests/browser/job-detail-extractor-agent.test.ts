import { describe, it, expect } from 'vitest';
import { ParseError } from '@jobscout/core';
import {
  EXTRACTION_STRATEGIES,
  extractJobDetail,
  mergeExtracted,
  parseResultTitle,
  splitTitleAtCompany,
  type SearchResultEntry,
} from '@jobscout/agents';

const scrapedAt = new Date('2024-03-10T12:00:00Z');

function entry(overrides: Partial<SearchResultEntry> = {}): SearchResultEntry {
  return { url: 'https://example.com/jobs/1', title: '', snippet: '', position: 1, ...overrides };
}

const JSON_LD_PAGE = `<html><head><title>Careers</title>
<script type="application/ld+json">{"@context":"https://schema.org","@type":"JobPosting","title":"Data Engineer","hiringOrganization":{"@type":"Organization","name":"Acme Analytics"},"jobLocation":{"@type":"Place","address":{"@type":"PostalAddress","addressLocality":"Arlington","addressRegion":"VA","addressCountry":"US"}},"description":"<p>Build pipelines.</p><ul><li>Python</li><li>SQL</li></ul>","datePosted":"2024-03-01"}</script>
</head><body><h1>Something else</h1></body></html>`;

describe('extractJobDetail', () => {
  it('prefers JSON-LD JobPosting metadata', () => {
    const job = extractJobDetail(
      JSON_LD_PAGE,
      entry({ url: 'https://careers.acme.com/jobs/42?utm_source=google', title: 'Data Engineer - Acme' }),
      { scrapedAt },
    );
    expect(job).toEqual({
      url: 'https://careers.acme.com/jobs/42',
      title: 'Data Engineer',
      company: 'Acme Analytics',
      location: 'Arlington, VA, US',
      description: 'Build pipelines.\nPython\nSQL',
      postedDate: '2024-03-01',
      scrapedAt,
    });
  });

  it('marks telecommute postings as remote', () => {
    const html = `<script type="application/ld+json">{"@graph":[{"@type":"WebPage"},{"@type":"JobPosting","title":"Analyst","hiringOrganization":"Acme","jobLocationType":"TELECOMMUTE"}]}</script>`;
    const job = extractJobDetail(html, entry(), { scrapedAt });
    expect(job.location).toBe('Remote');
    expect(job.company).toBe('Acme');
  });

  it('reads Greenhouse page titles and fills gaps from DOM and the search entry', () => {
    const html = `<html><head><title>Job Application for Senior Data Engineer at Acme</title></head>
      <body><div id="header"><h1 class="app-title">Senior Data Engineer</h1><div class="location">Washington, DC</div></div>
      <div id="content"><p>We are hiring.</p></div></body></html>`;
    const job = extractJobDetail(
      html,
      entry({
        url: 'https://boards.greenhouse.io/acme/jobs/123',
        snippet: '2 days ago — We are hiring data engineers.',
      }),
      { scrapedAt },
    );
    expect(job.title).toBe('Senior Data Engineer');
    expect(job.company).toBe('Acme');
    expect(job.location).toBe('Washington, DC');
    expect(job.description).toBe('We are hiring data engineers.');
    expect(job.postedDate).toBe('2024-03-08');
  });

  it('reads Lever posting headers', () => {
    const html = `<html><head><title>Acme - Platform Engineer</title></head><body>
      <div class="posting-headline"><h2>Platform Engineer</h2>
      <div class="posting-categories"><div class="location">Remote - US</div></div></div></body></html>`;
    const job = extractJobDetail(html, entry({ url: 'https://jobs.lever.co/acme/abc' }), { scrapedAt });
    expect([job.title, job.company, job.location]).toEqual(['Platform Engineer', 'Acme', 'Remote - US']);
  });

  it('builds a record from the search entry when the page is empty', () => {
    const job = extractJobDetail(
      '',
      entry({
        url: 'https://www.linkedin.com/jobs/view/123',
        title: 'Acme hiring Data Engineer in Arlington, VA | LinkedIn',
      }),
      { scrapedAt },
    );
    expect(job).toEqual({
      url: 'https://www.linkedin.com/jobs/view/123',
      title: 'Data Engineer',
      company: 'Acme',
      location: 'Arlington, VA',
      description: '',
      postedDate: null,
      scrapedAt,
    });
  });

  it('falls back to the URL for the company', () => {
    const job = extractJobDetail('<h1>Data Engineer</h1>', entry({ url: 'https://jobs.lever.co/data-works/1' }), {
      scrapedAt,
    });
    expect(job.title).toBe('Data Engineer');
    expect(job.company).toBe('Data Works');
  });

  it('throws ParseError when neither title nor company is recoverable', () => {
    expect(() =>
      extractJobDetail('<html><body><p>nothing</p></body></html>', entry({ url: 'https://www.indeed.com/viewjob?jk=1' }), {
        scrapedAt,
      }),
    ).toThrow(ParseError);
  });

  it('runs only the strategies it is given', () => {
    const job = extractJobDetail(JSON_LD_PAGE, entry({ title: 'Other Role - Other Co' }), {
      scrapedAt,
      strategies: EXTRACTION_STRATEGIES.filter((s) => s.name === 'search-entry'),
    });
    expect([job.title, job.company]).toEqual(['Other Role', 'Other Co']);
  });
});

describe('mergeExtracted', () => {
  it('keeps the first non-empty value per field', () => {
    expect(
      mergeExtracted([{ title: '  ' }, { title: 'A', company: 'B' }, { company: 'C', location: 'X' }]),
    ).toEqual({ title: 'A', company: 'B', location: 'X' });
  });
});

describe('parseResultTitle', () => {
  it('splits title, company and location and drops the board suffix', () => {
    expect(parseResultTitle('Data Engineer - Acme - Arlington, VA | Indeed.com')).toEqual({
      title: 'Data Engineer',
      company: 'Acme',
      location: 'Arlington, VA',
    });
  });

  it('drops a truncated trailing part', () => {
    expect(parseResultTitle('Data Engineer - Acme - Arlington, V...')).toEqual({
      title: 'Data Engineer',
      company: 'Acme',
    });
  });

  it('handles "X at Y" titles', () => {
    expect(splitTitleAtCompany('Data Engineer at Acme | Careers')).toEqual({
      title: 'Data Engineer',
      company: 'Acme',
    });
  });
});
