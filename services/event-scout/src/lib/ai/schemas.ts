import { z } from 'zod';

const optionalText = z.string().nullish().transform(value => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
});

export const eventFieldsSchema = z.object({
  title: optionalText,
  date: optionalText,
  location: optionalText,
  description: optionalText
});

export type EventFields = z.output<typeof eventFieldsSchema>;

/** Items are validated one by one later, so a bad entry never sinks the list. */
export const profileListsSchema = z.object({
  speakers: z.array(z.unknown()).nullish().transform(items => items ?? []),
  sponsors: z.array(z.unknown()).nullish().transform(items => items ?? [])
});

export type ProfileLists = z.output<typeof profileListsSchema>;

export const profileItemSchema = z.object({
  name: z.string().trim().min(1),
  title: optionalText,
  company: optionalText,
  bio: optionalText,
  image: optionalText,
  website: optionalText
});

export const relevanceSchema = z.object({
  score: z
    .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
    .refine(Number.isFinite, 'score must be a finite number'),
  highlight: z
    .union([z.string(), z.array(z.string())])
    .nullish()
    .transform(value => {
      const text = Array.isArray(value) ? value.join(', ') : value;
      const trimmed = text?.trim();
      return trimmed ? trimmed : undefined;
    })
});

export type RelevanceJudgement = z.output<typeof relevanceSchema>;
