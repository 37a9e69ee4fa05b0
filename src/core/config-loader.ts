/**
 * Config Loader
 * Loads and validates substitution and exclusion files from YAML/JSON
 */

import { readFileSync, existsSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import type { ExclusionRule, SubstitutionTable } from '../types/index.js';
import { ConfigurationFormatError } from './errors.js';
import type { ConfigurationSource } from './errors.js';

// Zod schemas for runtime validation
const ValueMapSchema = z.record(z.string(), z.string());

const SubstitutionScopeSchema = z.object({
  parts: ValueMapSchema.optional(),
  papers: ValueMapSchema.optional(),
  event_types: ValueMapSchema.optional(),
});

const SubstitutionsFileSchema = z.object({
  substitutions: z.record(z.string(), SubstitutionScopeSchema),
});

const ExclusionRuleSchema = z
  .object({
    part: z.string(),
    paper: z.string(),
    name: z.string(),
    event_type: z.string(),
    staff_name: z.string(),
    location: z.string(),
    uid: z.string(),
  })
  .partial()
  .strict();

const ExclusionsFileSchema = z.object({
  exclusions: z.array(ExclusionRuleSchema),
});

export class ConfigLoader {
  /**
   * Load the substitution table from a file path
   */
  static loadSubstitutions(filePath: string): SubstitutionTable {
    return this.parseSubstitutions(this.readFile('substitutions', filePath), filePath);
  }

  /**
   * Load the exclusion rules from a file path
   */
  static loadExclusions(filePath: string): ExclusionRule[] {
    return this.parseExclusions(this.readFile('exclusions', filePath), filePath);
  }

  /**
   * Validate an already-decoded substitutions document
   */
  static parseSubstitutions(document: unknown, filePath?: string): SubstitutionTable {
    this.requireTopLevelKey('substitutions', document, filePath);

    const result = SubstitutionsFileSchema.safeParse(document);
    if (!result.success) {
      throw new ConfigurationFormatError('substitutions', this.describeIssues(result.error), filePath);
    }
    return result.data.substitutions;
  }

  /**
   * Validate an already-decoded exclusions document
   */
  static parseExclusions(document: unknown, filePath?: string): ExclusionRule[] {
    this.requireTopLevelKey('exclusions', document, filePath);

    const result = ExclusionsFileSchema.safeParse(document);
    if (!result.success) {
      throw new ConfigurationFormatError('exclusions', this.describeIssues(result.error), filePath);
    }
    return result.data.exclusions;
  }

  private static readFile(source: ConfigurationSource, filePath: string): unknown {
    if (!existsSync(filePath)) {
      throw new ConfigurationFormatError(source, 'File not found', filePath);
    }

    const content = readFileSync(filePath, 'utf-8');

    if (filePath.endsWith('.yaml') || filePath.endsWith('.yml')) {
      try {
        return parseYaml(content);
      } catch (error) {
        throw new ConfigurationFormatError(source, `Unable to parse as YAML: ${errorMessage(error)}`, filePath);
      }
    }

    if (filePath.endsWith('.json')) {
      try {
        return JSON.parse(content);
      } catch (error) {
        throw new ConfigurationFormatError(source, `Unable to parse as JSON: ${errorMessage(error)}`, filePath);
      }
    }

    throw new ConfigurationFormatError(source, 'Unsupported config format. Use .yaml, .yml or .json', filePath);
  }

  /**
   * The two structural mistakes people actually make get their own messages
   */
  private static requireTopLevelKey(source: ConfigurationSource, document: unknown, filePath?: string): void {
    if (typeof document !== 'object' || document === null || Array.isArray(document)) {
      throw new ConfigurationFormatError(source, 'Top level value was not an object.', filePath);
    }
    if (!(source in document)) {
      throw new ConfigurationFormatError(source, `Top level object has no "${source}" key.`, filePath);
    }
  }

  private static describeIssues(error: z.ZodError): string {
    return error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('; ');
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
