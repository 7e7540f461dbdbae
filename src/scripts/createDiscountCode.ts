#!/usr/bin/env node
// src/scripts/createDiscountCode.ts
/**
 * Issue a discount code.
 *
 * Usage:
 *   node dist/scripts/createDiscountCode.js --code YALDA30 --percent 30 --max-uses 100 [--expires 2026-12-21]
 *
 * Options:
 *   --code <code>        3-32 letters, digits, "-" or "_" (matched case-insensitively)
 *   --percent <n>        Discount in percent, 1-100
 *   --max-uses <n>       Number of redemptions allowed (default: 1)
 *   --expires <date>     Optional ISO date after which the code is rejected
 *
 * Environment Variables:
 *   DB_PATH - Path to SQLite database (default: ./data/assistant.db)
 */

import { parseArgs } from 'node:util';
import type { NewDiscountCode } from '../types/discount.js';

/**
 * Turn command-line arguments into a new code definition
 *
 * @throws Error describing the first invalid option
 */
export function parseDiscountArgs(args: string[]): NewDiscountCode {
  const { values } = parseArgs({
    args,
    options: {
      code: { type: 'string' },
      percent: { type: 'string' },
      'max-uses': { type: 'string', default: '1' },
      expires: { type: 'string' },
    },
  });

  if (!values.code) {
    throw new Error('--code is required');
  }

  const percent = Number(values.percent);
  if (!Number.isFinite(percent) || percent <= 0 || percent > 100) {
    throw new Error('--percent must be a number between 1 and 100');
  }

  const maxUses = Number(values['max-uses']);
  if (!Number.isInteger(maxUses) || maxUses < 1) {
    throw new Error('--max-uses must be a positive integer');
  }

  let expiresAt: Date | null = null;
  if (values.expires) {
    expiresAt = new Date(values.expires);
    if (Number.isNaN(expiresAt.getTime())) {
      throw new Error(`--expires is not a valid date: ${values.expires}`);
    }
  }

  return {
    code: values.code,
    discountPercentage: percent / 100,
    maxUses,
    expiresAt,
  };
}

async function main() {
  try {
    const input = parseDiscountArgs(process.argv.slice(2));
    // Opening the database has side effects; load it only when run as a script
    const { createDiscountCode } = await import('../db/discountDb.js');
    const created = createDiscountCode(input);

    console.log(
      `[Discount] Created ${created.code}: ${Math.round(created.discountPercentage * 100)}% off, ` +
        `${created.maxUses} use(s), expires ${created.expiresAt?.toISOString() ?? 'never'}`
    );
  } catch (error) {
    console.error('[Discount] Failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void main();
}
