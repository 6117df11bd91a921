// src/services/functionRegistry.ts
import { FunctionNotFoundError } from '../jobs/errors';

export type FunctionArgs = Record<string, string | null>;

export type FunctionHandler = (args: FunctionArgs) => unknown | Promise<unknown>;

/**
 * Internal callable-function facility used by FUNC jobs.
 */
export interface FunctionInvoker {
  invoke(schema: string, name: string, args: FunctionArgs): Promise<string | null>;
}

export interface QualifiedName {
  schema: string;
  name: string;
}

/**
 * "billing.charge" -> { billing, charge }; "charge" -> { <default>, charge }.
 */
export function resolveFunctionName(target: string, defaultSchema: string): QualifiedName {
  const dot = target.indexOf('.');
  if (dot === -1) {
    return { schema: defaultSchema, name: target };
  }
  return { schema: target.slice(0, dot), name: target.slice(dot + 1) };
}

/**
 * Payload entries as named text arguments: strings as they are, other
 * values as JSON text, null stays null.
 */
export function toFunctionArgs(payload: Record<string, unknown>): FunctionArgs {
  const args: FunctionArgs = {};
  for (const [key, value] of Object.entries(payload)) {
    args[key] = value === null ? null : typeof value === 'string' ? value : JSON.stringify(value);
  }
  return args;
}

export class FunctionRegistry implements FunctionInvoker {
  private handlers = new Map<string, FunctionHandler>();

  register(qualifiedName: string, handler: FunctionHandler): this {
    if (!qualifiedName.includes('.')) {
      throw new Error(`Function name must be schema-qualified: ${qualifiedName}`);
    }
    this.handlers.set(qualifiedName, handler);
    return this;
  }

  has(schema: string, name: string): boolean {
    return this.handlers.has(`${schema}.${name}`);
  }

  async invoke(schema: string, name: string, args: FunctionArgs): Promise<string | null> {
    const qualified = `${schema}.${name}`;
    const handler = this.handlers.get(qualified);
    if (!handler) {
      throw new FunctionNotFoundError(qualified);
    }

    const result = await handler(args);
    if (result === undefined || result === null) return null;
    return typeof result === 'string' ? result : JSON.stringify(result);
  }
}
