import { z } from 'zod';

// Academic Source Schema
export const academicSourceSchema = z.object({
  title: z.string().min(1),
  url: z.string().min(1),
  excerpt: z.string(),
  domain: z.string(),
  credibilityScore: z.number().min(0).max(1),
  authors: z.array(z.string()).optional(),
  publicationDate: z.string().optional(),
  journalName: z.string().optional(),
  sourceType: z.string().default('web'),
});

export type AcademicSource = z.infer<typeof academicSourceSchema>;

// Research Findings Schema
export const researchFindingsSchema = z.object({
  keyword: z.string(),
  researchSummary: z.string(),
  academicSources: z.array(academicSourceSchema),
  mainFindings: z.array(z.string()),
  keyStatistics: z.array(z.string()).default([]),
  researchGaps: z.array(z.string()).default([]),
  totalSourcesAnalyzed: z.number().int().nonnegative(),
  searchQueryUsed: z.string(),
  researchTimestamp: z.string(),
});

export type ResearchFindings = z.infer<typeof researchFindingsSchema>;

// Article Schemas
export const articleSubsectionSchema = z.object({
  heading: z.string(),
  content: z.string(),
});

export type ArticleSubsection = z.infer<typeof articleSubsectionSchema>;

export const articleSectionSchema = z.object({
  heading: z.string(),
  content: z.string(),
  subsections: z.array(articleSubsectionSchema).optional(),
});

export type ArticleSection = z.infer<typeof articleSectionSchema>;

export const articleOutputSchema = z.object({
  title: z.string().min(1),
  metaDescription: z.string(),
  focusKeyword: z.string(),
  introduction: z.string(),
  mainSections: z.array(articleSectionSchema),
  conclusion: z.string(),
  wordCount: z.number().int().nonnegative(),
  readingTimeMinutes: z.number().int().nonnegative(),
  keywordDensity: z.number().min(0).max(1),
  internalLinks: z.array(z.string()).default([]),
  externalLinks: z.array(z.string()).default([]),
  sourcesUsed: z.array(z.string()),
});

export type ArticleOutput = z.infer<typeof articleOutputSchema>;

/**
 * A source can be cited only if it points at a web document.
 */
export function isUsableSource(source: AcademicSource): boolean {
  return /^https?:\/\//.test(source.url.trim());
}

export function getUsableSources(research: ResearchFindings): AcademicSource[] {
  return research.academicSources.filter(isUsableSource);
}

/**
 * Most credible sources first.
 */
export function getTopSources(research: ResearchFindings, n = 5): AcademicSource[] {
  return [...research.academicSources]
    .sort((a, b) => b.credibilityScore - a.credibilityScore)
    .slice(0, n);
}
