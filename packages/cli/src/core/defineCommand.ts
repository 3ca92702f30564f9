/**
 * Standard Command Wrapper
 *
 * - Commander owns flags & parsing (camelCase keys)
 * - The zod schema owns coercion and validation
 * - The handler owns the work and returns a result
 * - render() turns the result into text
 *
 * Errors propagate to the program's exit handling in bin/candlefold.ts.
 * Stores opened by the handler are closed once it finishes, failed or not.
 */

import type { Command } from 'commander';
import type { z } from 'zod';
import { ValidationError } from '@candlefold/utils';
import type { CommandContext } from './command-context.js';

export interface CommandDefinition<TSchema extends z.ZodTypeAny, TResult> {
  schema: TSchema;
  handler: (args: z.infer<TSchema>, ctx: CommandContext) => Promise<TResult>;
  render: (result: TResult, args: z.infer<TSchema>) => string;
}

/**
 * Validate raw options against a command schema
 */
export function parseCommandArgs<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  raw: unknown,
  commandName: string
): z.infer<TSchema> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `--${issue.path.join('.') || '(options)'}: ${issue.message}`
    );
    throw new ValidationError(`Invalid arguments for ${commandName}: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

export function defineCommand<TSchema extends z.ZodTypeAny, TResult>(
  cmd: Command,
  definition: CommandDefinition<TSchema, TResult>,
  getContext: () => CommandContext
): Command {
  cmd.action(async () => {
    const args = parseCommandArgs(definition.schema, cmd.opts(), cmd.name());
    const ctx = getContext();
    try {
      const result = await definition.handler(args, ctx);
      ctx.print(definition.render(result, args));
    } finally {
      await ctx.close();
    }
  });
  return cmd;
}
