import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { describe, expect, it, vi } from 'vitest';
import { jobPostingSchema, loadPage, type ParseContext } from '@jobdelta/parser-sdk';
import { parse } from '../src/index.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const fixture = readFileSync(resolve(__dirname, '../fixtures/posting.html'), 'utf-8');
const URL = 'https://jobs.smartrecruiters.com/Initech/743999912345678-machine-learning-engineer';

function createContext(): ParseContext {
  return {
    enricher: {
      findWebsite: vi.fn().mockResolvedValue('https://initech.test'),
      findContacts: vi.fn().mockResolvedValue({ linkedin: 'https://www.linkedin.com/in/recruiter-initech' }),
    },
  };
}

describe('SmartRecruiters parser', () => {
  it('extracts a live posting with location from metadata', async () => {
    const job = await parse(loadPage(URL, fixture), createContext());

    expect(job).toEqual({
      title: 'Machine Learning Engineer',
      company: 'Initech',
      location: 'Austin',
      description: 'Job Description Train ranking models for our support platform.',
      sourceUrl: URL,
      companyWebsite: 'https://initech.test',
      hrLinkedIn: 'https://www.linkedin.com/in/recruiter-initech',
      platform: 'SmartRecruiters',
    });
    expect(jobPostingSchema.safeParse(job).success).toBe(true);
  });

  it('leaves location Unknown without locality metadata', async () => {
    const html = fixture.replace('<meta itemprop="addressLocality" content="Austin" />', '');
    const job = await parse(loadPage(URL, html), createContext());

    expect(job?.location).toBe('Unknown');
    expect(job?.title).toBe('Machine Learning Engineer');
  });

  it('falls back to the st-jobTitle heading and job sections', async () => {
    const html = '<body><h1 id="st-jobTitle">QA Analyst</h1><div class="job-sections"><p>Test the product.</p></div></body>';
    const job = await parse(loadPage(URL, html), createContext());

    expect(job?.title).toBe('QA Analyst');
    expect(job?.description).toBe('Test the product.');
  });

  it('returns null when the job is no longer available', async () => {
    const html = '<body><h1 class="job-title">QA Analyst</h1><p>Sorry, this job is no longer available.</p></body>';

    await expect(parse(loadPage(URL, html), createContext())).resolves.toBeNull();
  });
});
