import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, afterEach, vi } from 'vitest';
import type { StoredJobOffer } from '../../db';
import { escapeHtml, renderReportHtml, writeReport } from '../html';

const offer: StoredJobOffer = {
  id: 7,
  source: 'Hexagon',
  name: 'R&D <Engineer>',
  url: 'https://jobs.test/offer/alpha?a=1&b=2',
  description: 'C++ "modern"',
  analysis: '{"opinia":"good"}',
  offerRating: 65,
  candidateRating: 48,
  added: new Date('2024-03-10T08:00:00Z'),
};

describe('escapeHtml', () => {
  it('escapes markup characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });
});

describe('renderReportHtml', () => {
  it('renders a header and one escaped row per offer', () => {
    const html = renderReportHtml([offer]);
    const lines = html.split('\n');

    expect(lines[3]).toBe(
      '<tr><th>ID</th><th>Source</th><th>Name</th><th>URL</th><th>Description</th>' +
        '<th>Analysis</th><th>Offer Rating</th><th>Candidate Rating</th><th>Added Date</th></tr>'
    );
    expect(lines[4]).toBe(
      '<tr><td>7</td><td>Hexagon</td><td>R&amp;D &lt;Engineer&gt;</td>' +
        '<td><a href="https://jobs.test/offer/alpha?a=1&amp;b=2" target="_blank">https://jobs.test/offer/alpha?a=1&amp;b=2</a></td>' +
        '<td>C++ &quot;modern&quot;</td><td>{&quot;opinia&quot;:&quot;good&quot;}</td>' +
        '<td>65</td><td>48</td><td>2024-03-10T08:00:00.000Z</td></tr>'
    );
  });
});

describe('writeReport', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes a timestamped file and returns its path', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'job-radar-report-'));
    const outputDir = path.join(dir, 'reports');

    const file = writeReport([offer], outputDir, new Date(2024, 2, 10, 8, 5, 9));

    expect(file).toBe(path.join(outputDir, 'report_20240310_080509.html'));
    expect(fs.readFileSync(file, 'utf8')).toBe(renderReportHtml([offer]));
  });
});
