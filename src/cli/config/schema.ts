/* src/cli/config/schema.ts
 * Zod schemas for devrelay.{yml,yaml,json}.
 */
import { z } from 'zod';

import { type Address, parseAddress } from '../../runner/http/address';
import { parseProgramSpec, type ProgramSpec } from '../../runner/task/program';
import type {
  CommandOperation,
  CopyOperation,
  Operation,
  OperationKind,
  SetWorkdirOperation,
} from '../../runner/task/types';

const message = (e: unknown): string =>
  e instanceof Error ? e.message : String(e);

// Common coercer for boolean-ish values
const coerceBool = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((v, ctx) => {
    if (typeof v === 'boolean') return v;
    if (typeof v === 'number') return v === 1;
    const s = v.trim().toLowerCase();
    if (s === '1' || s === 'true') return true;
    if (s === '0' || s === 'false') return false;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected a boolean, got "${v}"`,
    });
    return z.NEVER;
  });

const nonBlank = z
  .string()
  .refine((s) => s.trim().length > 0, { message: 'must be a non-empty string' });

export const addressSchema = z
  .union([z.number(), z.string()])
  .transform((v, ctx): Address => {
    try {
      return parseAddress(v);
    } catch (e) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: message(e) });
      return z.NEVER;
    }
  });

export const programSchema = z
  .union([z.string(), z.array(z.string())])
  .transform((v, ctx): ProgramSpec => {
    try {
      return parseProgramSpec(v);
    } catch (e) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: message(e) });
      return z.NEVER;
    }
  });

const commandSchema = z
  .object({
    command: z.union([
      programSchema,
      z.object({ run: programSchema, workdir: nonBlank.optional() }).strict(),
    ]),
    workdir: nonBlank.optional(),
  })
  .strict()
  .transform((v, ctx): CommandOperation => {
    if ('run' in v.command) {
      if (v.workdir !== undefined && v.command.workdir !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['workdir'],
          message: 'workdir given twice',
        });
        return z.NEVER;
      }
      return {
        kind: 'command',
        run: v.command.run,
        workdir: v.command.workdir ?? v.workdir,
      };
    }
    return { kind: 'command', run: v.command, workdir: v.workdir };
  });

const setWorkdirSchema = z
  .object({ 'set-workdir': nonBlank })
  .strict()
  .transform(
    (v): SetWorkdirOperation => ({ kind: 'set-workdir', path: v['set-workdir'] }),
  );

const copySchema = z
  .object({ copy: z.object({ src: nonBlank, dst: nonBlank }).strict() })
  .strict()
  .transform(
    (v): CopyOperation => ({ kind: 'copy', src: v.copy.src, dst: v.copy.dst }),
  );

const operationSchemas: Record<
  OperationKind,
  z.ZodType<Operation, z.ZodTypeDef, unknown>
> = {
  command: commandSchema,
  'set-workdir': setWorkdirSchema,
  copy: copySchema,
};

const OPERATION_KINDS: OperationKind[] = ['command', 'set-workdir', 'copy'];

/** One operation item: an object keyed by exactly one operation keyword. */
export const operationSchema = z
  .record(z.string(), z.unknown())
  .transform((raw, ctx): Operation => {
    const kinds = OPERATION_KINDS.filter((k) =>
      Object.prototype.hasOwnProperty.call(raw, k),
    );
    if (kinds.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected exactly one of ${OPERATION_KINDS.join(', ')} (got ${
          Object.keys(raw).join(', ') || 'none'
        })`,
      });
      return z.NEVER;
    }
    const parsed = operationSchemas[kinds[0]].safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: issue.path,
          message: issue.message,
        });
      }
      return z.NEVER;
    }
    return parsed.data;
  });

export const httpSchema = z
  .object({
    addr: addressSchema.optional(),
    proxy: addressSchema,
    autoReload: coerceBool.optional(),
    wsAddr: addressSchema.optional(),
  })
  .strict();
export type RawHttpConfig = z.infer<typeof httpSchema>;

export const configSchema = z
  .object({
    workdir: nonBlank.optional(),
    http: httpSchema.optional(),
    tasks: z
      .record(nonBlank, z.array(operationSchema))
      .default({}),
  })
  .strict();
export type Config = z.infer<typeof configSchema>;
