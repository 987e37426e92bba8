import type { Context } from 'hono';
import type { ZodError } from 'zod';

/**
 * zValidator hook: answer 400 with the same body shape as domain validation errors
 */
export function validationHook(
  result: { success: true } | { success: false; error: ZodError },
  c: Context
) {
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    return c.json({ error: 'Validation failed', issues }, 400);
  }
}
