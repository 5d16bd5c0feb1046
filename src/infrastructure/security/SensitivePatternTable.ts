import { createRequire } from 'node:module';
import { z } from 'zod';

const PatternTableSchema = z.object({
  directories: z.array(z.string().min(1)),
  extensions: z.array(z.string().startsWith('.')),
  patterns: z.array(z.object({
    pattern: z.string().min(1),
    description: z.string().min(1),
  })),
});

/** 內建敏感規則表（assets/sensitive-patterns.json） */
export type SensitivePatternTable = z.infer<typeof PatternTableSchema>;

let cached: SensitivePatternTable | undefined;

/**
 * 載入內建規則表，整個 process 只讀一次
 * src/infrastructure/security → 往上 3 層 → package root → assets/
 */
export function loadSensitivePatternTable(): SensitivePatternTable {
  if (!cached) {
    const require = createRequire(import.meta.url);
    const raw: unknown = require('../../../assets/sensitive-patterns.json');
    cached = PatternTableSchema.parse(raw);
  }
  return cached;
}
