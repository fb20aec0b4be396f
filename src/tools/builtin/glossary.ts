import { readFile } from "node:fs/promises";

import { z } from "zod";

import type { StructuredLogger } from "../../logger.js";
import { defineDirectTool } from "../directTool.js";
import type { DirectToolImplementation } from "../types.js";

export const GLOSSARY_TOOL_NAME = "glossary-tool";
export const DEFAULT_GLOSSARY_DESCRIPTION = "Tool to explain technical words or concepts.";
export const GLOSSARY_NO_MATCH_TEXT = "Unfortunately none of the words is known to the glossary tool";

export interface GlossaryEntry {
  readonly term: string;
  readonly description: string;
}

/** Parsed glossary: entries by normalised key plus `-> Other` aliases. */
export interface Glossary {
  readonly entries: ReadonlyMap<string, GlossaryEntry>;
  readonly references: ReadonlyMap<string, string>;
}

/** Lower-cases and strips spaces, underscores and dashes. */
export function glossaryKey(term: string): string {
  return term.toLowerCase().replace(/[ _-]/g, "");
}

/**
 * Parses a markdown glossary made of `# Term` sections. A section whose body
 * starts with `-> ` aliases another term. The first definition of a key wins;
 * duplicates are reported through `onDuplicate`.
 */
export function parseGlossary(
  markdown: string,
  onDuplicate?: (key: string, kept: string, ignored: string) => void,
): Glossary {
  const entries = new Map<string, GlossaryEntry>();
  const references = new Map<string, string>();
  let currentTerm: string | null = null;
  let body: string[] = [];

  const flush = (): void => {
    const description = body.join("\n").trim();
    if (currentTerm === null || description.length === 0) {
      return;
    }
    const key = glossaryKey(currentTerm);
    if (description.startsWith("-> ")) {
      references.set(key, glossaryKey(description.slice(3)));
      return;
    }
    const existing = entries.get(key);
    if (existing) {
      onDuplicate?.(key, existing.term, currentTerm);
      return;
    }
    entries.set(key, { term: currentTerm, description });
  };

  for (const line of markdown.split(/\r?\n/)) {
    if (line.startsWith("# ")) {
      flush();
      currentTerm = line.slice(2).trim();
      body = [];
    } else if (currentTerm !== null) {
      body.push(line);
    }
  }
  flush();
  return { entries, references };
}

export async function loadGlossary(filePath: string, logger: StructuredLogger): Promise<Glossary> {
  const markdown = await readFile(filePath, "utf8");
  const glossary = parseGlossary(markdown, (key, kept, ignored) => {
    logger.warn("glossary_duplicate_key", { key, kept, ignored });
  });
  logger.info("glossary_loaded", { path: filePath, entries: glossary.entries.size });
  return glossary;
}

/** Renders the sections of every known word, in request order, each term once. */
export function explainWords(glossary: Glossary, words: readonly string[]): string {
  const seen = new Set<string>();
  const sections: string[] = [];
  for (const word of words) {
    const key = glossaryKey(word);
    const lookup = glossary.references.get(key) ?? key;
    if (seen.has(lookup)) {
      continue;
    }
    seen.add(lookup);
    const entry = glossary.entries.get(lookup);
    if (entry) {
      sections.push(`# ${entry.term}\n${entry.description}`);
    }
  }
  return sections.length > 0 ? sections.join("\n\n") : GLOSSARY_NO_MATCH_TEXT;
}

const GlossaryInputSchema = z.object({
  words: z.union([z.string(), z.array(z.string())]),
});

export function createGlossaryTool(
  glossary: Glossary,
  logger: StructuredLogger,
  description: string = DEFAULT_GLOSSARY_DESCRIPTION,
): DirectToolImplementation {
  return defineDirectTool(
    Object.freeze({
      name: GLOSSARY_TOOL_NAME,
      title: "Glossary Tool",
      description,
      inputSchema: Object.freeze({
        type: "object" as const,
        properties: Object.freeze({
          words: { type: "string", description: "list of words or concepts to be explained." },
        }),
        required: Object.freeze(["words"]),
      }),
    }),
    GlossaryInputSchema,
    async (input) => {
      const words = typeof input.words === "string" ? input.words.split(/ *, */) : input.words;
      const text = explainWords(glossary, words);
      logger.debug("glossary_lookup", { words, matched: text !== GLOSSARY_NO_MATCH_TEXT });
      return [{ type: "text", text }];
    },
  );
}
