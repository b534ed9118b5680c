import { z } from 'zod';
import fs from 'node:fs';
import path from 'node:path';
import { parse as yamlParse, stringify as yamlStringify } from 'yaml';
import { RecipeError } from '../shared/errors.js';
import { checkPattern } from './filters.js';

const FilterRuleSchema = z
  .object({
    title: z.string().min(1).optional(),
    invert: z.boolean().default(false),
  })
  .superRefine((rule, ctx) => {
    if (rule.title === undefined) return;
    const problem = checkPattern(rule.title);
    if (problem) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid title pattern: ${problem}`, path: ['title'] });
    }
  });

export const RecipeSchema = z.object({
  urls: z.array(z.string().url()).min(1),
  filters: z.array(FilterRuleSchema).default([]),
  fulfill: z.boolean().default(false),
});

export const RecipeFileSchema = z.object({
  recipes: z.record(z.string().min(1), RecipeSchema),
});

export type FilterRule = z.infer<typeof FilterRuleSchema>;
export type Recipe = z.infer<typeof RecipeSchema>;
export type RecipeCollection = Record<string, Recipe>;

export function parseRecipesYaml(yamlContent: string): RecipeCollection {
  let raw: unknown;
  try {
    raw = yamlParse(yamlContent);
  } catch (err) {
    throw new RecipeError(`Recipes file is not valid YAML: ${err instanceof Error ? err.message : String(err)}`);
  }

  const parsed = RecipeFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RecipeError('Invalid recipes file', {
      errors: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data.recipes;
}

export function loadRecipes(filePath: string): RecipeCollection {
  if (!fs.existsSync(filePath)) {
    throw new RecipeError(`Recipes file not found: ${filePath}`);
  }
  return parseRecipesYaml(fs.readFileSync(filePath, 'utf-8'));
}

/**
 * Keep only the named recipes. Unknown names are an error so typos don't silently skip work.
 */
export function selectRecipes(recipes: RecipeCollection, names: readonly string[]): RecipeCollection {
  if (names.length === 0) return recipes;

  const unknown = names.filter((n) => !(n in recipes));
  if (unknown.length > 0) {
    throw new RecipeError(`Unknown recipe: ${unknown.join(', ')}. Available: ${Object.keys(recipes).join(', ')}`);
  }
  return Object.fromEntries(names.map((n) => [n, recipes[n]]));
}

/** Every feed URL referenced by any recipe; the known-key set for cache cleanup. */
export function allRecipeUrls(recipes: RecipeCollection): Set<string> {
  const urls = new Set<string>();
  for (const recipe of Object.values(recipes)) {
    for (const url of recipe.urls) urls.add(url);
  }
  return urls;
}

export function writeSampleRecipes(filePath: string): void {
  const sample = {
    recipes: {
      'Rust News': {
        urls: ['https://hnrss.org/frontpage.atom?q=rust', 'https://www.reddit.com/r/rust.rss'],
        fulfill: true,
      },
      'Release Notes': {
        urls: ['https://github.com/nodejs/node/releases.atom'],
        filters: [{ title: 'nightly|rc', invert: true }],
      },
    },
  };
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, yamlStringify(sample), 'utf-8');
}
