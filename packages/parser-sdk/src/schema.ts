import { z } from 'zod';
import { PLATFORMS } from './types.js';

export const MAX_DESCRIPTION_LENGTH = 500;
export const ELLIPSIS = '...';

export const jobPostingSchema = z.object({
  title: z.string().min(1),
  company: z.string().min(1),
  location: z.string().min(1),
  description: z
    .string()
    .min(1)
    .max(MAX_DESCRIPTION_LENGTH + ELLIPSIS.length),
  sourceUrl: z.string().url(),
  companyWebsite: z.string().optional(),
  hrEmail: z.string().optional(),
  hrName: z.string().optional(),
  hrLinkedIn: z.string().optional(),
  platform: z.enum(PLATFORMS),
});

export type ValidatedJobPosting = z.infer<typeof jobPostingSchema>;

export interface ValidateJobPostingsOptions {
  onInvalid?: (issues: z.ZodIssue[], posting: unknown) => void;
}

export function validateJobPostings(postings: unknown[], options?: ValidateJobPostingsOptions): ValidatedJobPosting[] {
  const valid: ValidatedJobPosting[] = [];

  for (const posting of postings) {
    const result = jobPostingSchema.safeParse(posting);
    if (result.success) {
      valid.push(result.data);
    } else {
      options?.onInvalid?.(result.error.issues, posting);
    }
  }

  return valid;
}
