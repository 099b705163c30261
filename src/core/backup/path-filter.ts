/**
 * Exclusion rules for archive entries
 */

import * as path from "node:path";
import type { ExclusionConfig, ExclusionRuleSet } from "../../types";

export const DEFAULT_EXCLUDED_DIRECTORIES = [".venv", "__pycache__", ".git", "node_modules"] as const;

export const DEFAULT_EXCLUDED_EXTENSIONS = [".pyc", ".log", ".tmp"] as const;

function normalizeExtension(extension: string): string {
  const trimmed = extension.trim();
  return trimmed.startsWith(".") ? trimmed : `.${trimmed}`;
}

/**
 * Build the rule set for a run: the built-in names and suffixes plus any
 * configured additions. Matching is case-sensitive.
 */
export function createExclusionRules(extra?: Partial<ExclusionConfig>): ExclusionRuleSet {
  const directories = new Set<string>(DEFAULT_EXCLUDED_DIRECTORIES);
  for (const name of extra?.directories ?? []) {
    const trimmed = name.trim();
    if (trimmed) directories.add(trimmed);
  }

  const extensions = new Set<string>(DEFAULT_EXCLUDED_EXTENSIONS);
  for (const extension of extra?.extensions ?? []) {
    if (extension.trim()) extensions.add(normalizeExtension(extension));
  }

  return { directories, extensions: [...extensions] };
}

export class PathFilter {
  constructor(readonly rules: ExclusionRuleSet = createExclusionRules()) {}

  /**
   * Directories are matched on their exact base name; an excluded directory
   * takes its whole subtree with it. Files are matched on name suffix.
   */
  shouldExclude(entryPath: string, isDirectory: boolean): boolean {
    const name = path.basename(entryPath);

    if (isDirectory) {
      return this.rules.directories.has(name);
    }

    return this.rules.extensions.some((extension) => name.endsWith(extension));
  }
}
