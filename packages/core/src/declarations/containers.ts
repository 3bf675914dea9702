import { DictFactory, ListFactory } from '../factory/factory.js';
import type { DeclarationKind } from './base.js';
import { SubFactory } from './sub-factory.js';

/**
 * Plain object whose values may themselves be declarations; shares the
 * enclosing object's sequence number
 */
export class DictDeclaration extends SubFactory<Record<string, unknown>> {
  override readonly kind: DeclarationKind = 'dict';

  constructor(params: Readonly<Record<string, unknown>>) {
    super(DictFactory, params, true);
  }
}

export class ListDeclaration extends SubFactory<unknown[]> {
  override readonly kind: DeclarationKind = 'list';

  constructor(items: readonly unknown[]) {
    super(
      ListFactory,
      Object.fromEntries(items.map((item, index) => [String(index), item])),
      true
    );
  }
}

export const dict = (params: Readonly<Record<string, unknown>>): DictDeclaration =>
  new DictDeclaration(params);

export const list = (items: readonly unknown[]): ListDeclaration => new ListDeclaration(items);
