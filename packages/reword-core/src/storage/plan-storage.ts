/**
 * Plan persistence
 */

import { readFile, writeFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { PlanSchema, SchemaError, type Plan } from '@reword/contracts';
import type { ZodError } from 'zod';

/**
 * Pretty-printed JSON with a trailing newline, so the file diffs and edits cleanly
 */
export function serializePlan(plan: Plan): string {
  return `${JSON.stringify(plan, null, 2)}\n`;
}

/**
 * Parse and validate a plan
 *
 * @param source - Name used in error messages (usually the file path)
 * @throws SchemaError listing every offending field
 */
export function deserializePlan(text: string, source = 'plan'): Plan {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new SchemaError(`${source} is not valid JSON`, [reason], { cause: error });
  }

  const result = PlanSchema.safeParse(data);
  if (!result.success) {
    throw new SchemaError(`${source} is not a valid plan`, formatIssues(result.error));
  }
  return result.data;
}

function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Write a plan, creating parent directories as needed
 */
export async function savePlan(path: string, plan: Plan): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializePlan(plan), 'utf-8');
}

/**
 * Read and validate a plan file
 */
export async function loadPlan(path: string): Promise<Plan> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new SchemaError(`plan file not found: ${path}`, [], { cause: error });
    }
    throw error;
  }
  return deserializePlan(text, path);
}
