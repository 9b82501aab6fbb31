import { z } from 'zod';

// ── InteractiveElement ───────────────────────────────────────

export const interactiveElementSchema = z.object({
  index: z.number().int().nonnegative(),
  tag: z.string().min(1),
  xpath: z.string().min(1),
  type: z.string().optional(),
  text: z.string().optional(),
  name: z.string().optional(),
  placeholder: z.string().optional(),
  ariaLabel: z.string().optional(),
  href: z.string().optional(),
});

export type InteractiveElement = z.infer<typeof interactiveElementSchema>;

// ── PageSnapshot ─────────────────────────────────────────────

export const pageSnapshotSchema = z.object({
  url: z.string(),
  title: z.string(),
  visibleText: z.string(),
  elements: z.array(interactiveElementSchema),
  tabs: z.array(z.object({ pageId: z.number().int().nonnegative(), url: z.string() })),
});

export type PageSnapshot = z.infer<typeof pageSnapshotSchema>;
