/**
 * Model introspection for auto-derived declarations.
 *
 * Host adapters subclass BaseIntrospector, teaching it how to list a
 * model's fields and which declaration to build for each field class.
 */

import { ErrorCode } from '../errors/codes.js';
import { IntrospectorError } from '../types/errors.js';

/** What an introspector is created for */
export interface IntrospectionTarget {
  readonly name: string;
  readonly model: unknown;
}

export interface FieldContext<F = unknown> {
  field: F;
  fieldName: string;
  model: unknown;
  /** Name of the factory the declarations are built for */
  factory: string;
  /** Nested names (`field__<name>`) that must not be auto-declared */
  skips: string[];
}

export type DeclarationBuilder = (context: FieldContext) => unknown;

export interface Introspector {
  defaultFieldNames(model: unknown): Iterable<string>;
  /** Field descriptor, or undefined when the model has no such field */
  fieldByName(model: unknown, fieldName: string): unknown;
  /** Declaration for a field, or undefined to leave it out */
  buildDeclaration(context: FieldContext): unknown;
  buildDeclarations(
    forFields: Iterable<string>,
    skipFields: ReadonlySet<string>
  ): Map<string, unknown>;
}

export type IntrospectorConstructor = new (target: IntrospectionTarget) => Introspector;

/** Class of a field descriptor; recipes are looked up by exact class */
export type FieldClass = abstract new (...args: never) => unknown;

export class BaseIntrospector implements Introspector {
  protected readonly builders: Map<FieldClass, DeclarationBuilder>;

  constructor(protected readonly target: IntrospectionTarget) {
    // Copied so subclasses can extend the table without sharing it
    this.builders = new Map(this.defaultBuilders());
  }

  /** Field class → declaration builder pairs; override to add recipes */
  protected defaultBuilders(): Iterable<[FieldClass, DeclarationBuilder]> {
    return [];
  }

  defaultFieldNames(model: unknown): Iterable<string> {
    throw new IntrospectorError({
      message: `${this} doesn't know how to extract fields from ${describeModel(model)}`,
      context: { factory: this.target.name },
    });
  }

  fieldByName(model: unknown, fieldName: string): unknown {
    throw new IntrospectorError({
      message: `${this} doesn't know how to fetch field ${fieldName} from ${describeModel(model)}`,
      context: { factory: this.target.name, attribute: fieldName },
    });
  }

  buildDeclaration(context: FieldContext): unknown {
    const { field } = context;
    if (field === undefined || field === null) return undefined;

    const builder = this.#builderFor(field);
    if (!builder) {
      throw new IntrospectorError({
        message: `${this} lacks a recipe for building field ${context.fieldName} (${describeModel(field)}); add it to defaultBuilders()`,
        errorCode: ErrorCode.INTROSPECTOR_MISSING_RECIPE,
        context: { factory: context.factory, attribute: context.fieldName },
      });
    }
    return builder(context);
  }

  buildDeclarations(
    forFields: Iterable<string>,
    skipFields: ReadonlySet<string>
  ): Map<string, unknown> {
    const declarations = new Map<string, unknown>();
    for (const fieldName of forFields) {
      if (skipFields.has(fieldName)) continue;

      const prefix = `${fieldName}__`;
      const skips = [...skipFields]
        .filter((skip) => skip.startsWith(prefix))
        .map((skip) => skip.slice(prefix.length));

      const declaration = this.buildDeclaration({
        field: this.fieldByName(this.target.model, fieldName),
        fieldName,
        model: this.target.model,
        factory: this.target.name,
        skips,
      });
      if (declaration !== undefined) declarations.set(fieldName, declaration);
    }
    return declarations;
  }

  #builderFor(field: unknown): DeclarationBuilder | undefined {
    if (field === null || typeof field !== 'object') return undefined;
    for (const [fieldClass, builder] of this.builders) {
      if (Object.getPrototypeOf(field) === fieldClass.prototype) return builder;
    }
    return undefined;
  }

  toString(): string {
    return `<${this.constructor.name} for ${this.target.name}>`;
  }
}

function describeModel(model: unknown): string {
  if (typeof model === 'function') return model.name || 'anonymous model';
  if (model !== null && typeof model === 'object') return model.constructor.name;
  return String(model);
}
