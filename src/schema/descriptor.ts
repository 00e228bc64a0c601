import { z } from 'zod';
import { InternalError, SchemaDescriptorError } from '../validation/errors.js';
import type { ValidationIssue } from '../validation/errors.js';
import { t } from './builders.js';
import type { FieldDescriptor, NameNamespaceAnnotation, PrimitiveKind, SchemaType } from './types.js';

// ============================================================================
// Descriptor shapes
// ============================================================================

export type TypeExpression =
  | PrimitiveKind
  | { array: TypeExpression; size?: number }
  | { union: TypeExpression[] }
  | { map: TypeExpression }
  | { ref: string }
  | RecordExpression;

export interface RecordExpression {
  name?: string;
  fields: FieldExpression[];
  rest?: TypeExpression;
  annotations?: NameNamespaceAnnotation;
}

export interface FieldExpression {
  name: string;
  type: TypeExpression;
  /** @default false */
  optional?: boolean;
  annotations?: NameNamespaceAnnotation;
}

export interface SchemaDescriptor {
  root: string;
  types: Record<string, TypeExpression>;
}

// ============================================================================
// Validation schemas
// ============================================================================

export const PrimitiveKindSchema = z.enum(['string', 'int', 'float', 'decimal', 'boolean', 'nil', 'anydata']);

export const NamespaceAnnotationSchema = z
  .object({
    uri: z.string(),
    prefix: z
      .string()
      .regex(/^[A-Za-z_][\w.-]*$/, 'prefix must be an XML NCName')
      .optional(),
  })
  .strict();

export const AnnotationSchema = z
  .object({
    name: z.string().min(1, 'name annotation must not be empty').optional(),
    namespace: NamespaceAnnotationSchema.optional(),
    attribute: z.boolean().optional(),
  })
  .strict();

export const TypeExpressionSchema: z.ZodType<TypeExpression> = z.lazy(() =>
  z.union([
    PrimitiveKindSchema,
    z.object({ array: TypeExpressionSchema, size: z.number().int().nonnegative().optional() }).strict(),
    z.object({ union: z.array(TypeExpressionSchema).min(1, 'a union needs at least one member') }).strict(),
    z.object({ map: TypeExpressionSchema }).strict(),
    z.object({ ref: z.string().min(1) }).strict(),
    RecordExpressionSchema,
  ]),
);

export const FieldExpressionSchema: z.ZodType<FieldExpression> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1),
      type: TypeExpressionSchema,
      optional: z.boolean().optional(),
      annotations: AnnotationSchema.optional(),
    })
    .strict(),
);

export const RecordExpressionSchema: z.ZodType<RecordExpression> = z.lazy(() =>
  z
    .object({
      name: z.string().min(1).optional(),
      fields: z.array(FieldExpressionSchema),
      rest: TypeExpressionSchema.optional(),
      annotations: AnnotationSchema.optional(),
    })
    .strict(),
);

function declares(types: Record<string, TypeExpression>, name: string): boolean {
  return Object.prototype.hasOwnProperty.call(types, name);
}

export const SchemaDescriptorSchema = z
  .object({
    root: z.string().min(1),
    types: z.record(TypeExpressionSchema),
  })
  .strict()
  .superRefine((descriptor, ctx) => {
    if (!declares(descriptor.types, descriptor.root)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['root'],
        message: `root type "${descriptor.root}" is not declared in types`,
      });
    }
    for (const [name, expr] of Object.entries(descriptor.types)) {
      for (const ref of collectRefs(expr)) {
        if (!declares(descriptor.types, ref)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['types', name],
            message: `reference to undeclared type "${ref}"`,
          });
        }
      }
    }
  });

function collectRefs(expr: TypeExpression, out: string[] = []): string[] {
  if (typeof expr === 'string') return out;
  if ('ref' in expr) out.push(expr.ref);
  else if ('array' in expr) collectRefs(expr.array, out);
  else if ('union' in expr) expr.union.forEach((member) => collectRefs(member, out));
  else if ('map' in expr) collectRefs(expr.map, out);
  else {
    expr.fields.forEach((field) => collectRefs(field.type, out));
    if (expr.rest) collectRefs(expr.rest, out);
  }
  return out;
}

// ============================================================================
// Building schema types
// ============================================================================

class DescriptorBuilder {
  private readonly named = new Map<string, SchemaType>();

  constructor(private readonly types: Record<string, TypeExpression>) {}

  resolveNamed(name: string): SchemaType {
    let type = this.named.get(name);
    if (!type) {
      if (!declares(this.types, name)) {
        throw new InternalError(`descriptor type "${name}" was not validated`);
      }
      type = this.build(this.types[name], name);
      this.named.set(name, type);
    }
    return type;
  }

  private build(expr: TypeExpression, name: string): SchemaType {
    if (typeof expr === 'string') return t.primitive(expr);
    if ('ref' in expr) {
      const target = expr.ref;
      return t.ref(target, () => this.resolveNamed(target));
    }
    if ('array' in expr) return t.array(this.build(expr.array, name), expr.size);
    if ('union' in expr) return t.union(...expr.union.map((member) => this.build(member, name)));
    if ('map' in expr) return t.map(this.build(expr.map, name));

    const fields = expr.fields.map((field): FieldDescriptor =>
      t.field(field.name, this.build(field.type, `${name}.${field.name}`), {
        ...field.annotations,
        required: !field.optional,
      }),
    );
    return t.record(expr.name ?? name, fields, {
      annotations: expr.annotations,
      restType: expr.rest === undefined ? undefined : this.build(expr.rest, `${name}.*`),
    });
  }
}

/**
 * Builds a schema type from a JSON descriptor. This is the boundary where
 * untyped schema metadata becomes a {@link SchemaType}.
 *
 * @example
 * ```typescript
 * const Person = parseSchemaDescriptor({
 *   root: 'Person',
 *   types: {
 *     Person: {
 *       fields: [
 *         { name: 'id', type: 'int', annotations: { attribute: true } },
 *         { name: 'name', type: 'string' },
 *       ],
 *     },
 *   },
 * });
 * ```
 *
 * @throws `SchemaDescriptorError` listing every problem found.
 */
export function parseSchemaDescriptor(input: unknown): SchemaType {
  const result = SchemaDescriptorSchema.safeParse(input);
  if (!result.success) {
    const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
      path: ['$', ...issue.path].join('.'),
      message: issue.message,
    }));
    throw new SchemaDescriptorError(issues);
  }
  const descriptor = result.data;
  return new DescriptorBuilder(descriptor.types).resolveNamed(descriptor.root);
}
