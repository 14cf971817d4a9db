import { resolve } from "path";
import { z } from "zod";
import { getConfigDir, readJsonFile } from "../json";
import { normalizeTerm } from "../normalize";
import type { TaxonomyDomain } from "../types";

const domainSchema = z.enum([
  "expertise",
  "industry",
  "language",
  "credential",
  "speaking_format",
  "demographics",
]);

const categorySchema = z.object({
  code: z.string().min(1),
  displayName: z.string().min(1),
  parent: z.string().min(1).nullable(),
  aliases: z.array(z.string().min(1)),
});

export const taxonomyTableSchema = z
  .object({
    domain: domainSchema,
    version: z.string().min(1),
    categories: z.array(categorySchema).min(1),
  })
  .superRefine((table, ctx) => {
    const codes = new Set<string>();
    table.categories.forEach((category, index) => {
      if (codes.has(category.code)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["categories", index, "code"],
          message: `duplicate category code "${category.code}"`,
        });
      }
      codes.add(category.code);
    });
    table.categories.forEach((category, index) => {
      if (category.parent !== null && !codes.has(category.parent)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["categories", index, "parent"],
          message: `unknown parent "${category.parent}"`,
        });
      }
    });
  });

export type TaxonomyTable = z.infer<typeof taxonomyTableSchema>;
export type TaxonomyCategory = TaxonomyTable["categories"][number];

export type AliasEntry = {
  alias: string;
  codes: string[];
};

export type IndexedTable = {
  table: TaxonomyTable;
  // normalized alias -> category codes, in table order
  aliases: Map<string, string[]>;
  // longest aliases first, then alphabetical
  rankedAliases: AliasEntry[];
  parents: Map<string, string | null>;
  order: Map<string, number>;
};

export const indexTable = (table: TaxonomyTable): IndexedTable => {
  const aliases = new Map<string, string[]>();
  const parents = new Map<string, string | null>();
  const order = new Map<string, number>();

  table.categories.forEach((category, index) => {
    parents.set(category.code, category.parent);
    order.set(category.code, index);
    for (const alias of category.aliases) {
      const normalized = normalizeTerm(alias);
      if (!normalized) {
        continue;
      }
      const codes = aliases.get(normalized) ?? [];
      if (!codes.includes(category.code)) {
        codes.push(category.code);
      }
      aliases.set(normalized, codes);
    }
  });

  const rankedAliases = Array.from(aliases.entries())
    .map(([alias, codes]) => ({ alias, codes }))
    .sort((a, b) => b.alias.length - a.alias.length || (a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0));

  return { table, aliases, rankedAliases, parents, order };
};

export const TAXONOMY_FILES: Record<TaxonomyDomain, string> = {
  expertise: "expertise.json",
  industry: "industry.json",
  language: "language.json",
  credential: "credential.json",
  speaking_format: "speaking_format.json",
  demographics: "demographics.json",
};

export const getTaxonomyDir = () => resolve(getConfigDir(), "taxonomies");

export const loadTaxonomyTable = (
  domain: TaxonomyDomain,
  options: { directory?: string; version?: string } = {},
) => {
  const filePath = resolve(options.directory ?? getTaxonomyDir(), TAXONOMY_FILES[domain]);
  const table = readJsonFile(filePath, taxonomyTableSchema);
  if (table.domain !== domain) {
    throw new Error(`Taxonomy file ${filePath} declares domain "${table.domain}", expected "${domain}"`);
  }
  if (options.version && table.version !== options.version) {
    throw new Error(
      `Taxonomy "${domain}" is version ${table.version}, configured version is ${options.version}`,
    );
  }
  return table;
};
