import { describe, it, expect } from 'vitest';
import { DeclarationSet, parseDeclarations } from '../declaration-set.js';
import { lazyFunction } from '../../declarations/attributes.js';
import { postGeneration } from '../../declarations/post-generation.js';
import { ErrorCode } from '../../errors/codes.js';

describe('DeclarationSet', () => {
  it('splits keys on the first separator only', () => {
    expect(DeclarationSet.split('owner')).toEqual(['owner', undefined]);
    expect(DeclarationSet.split('owner__name')).toEqual(['owner', 'name']);
    expect(DeclarationSet.split('owner__address__city')).toEqual(['owner', 'address__city']);
    expect(DeclarationSet.split('owner__')).toEqual(['owner', '']);
    expect(DeclarationSet.join('owner', undefined)).toBe('owner');
    expect(DeclarationSet.join('owner', '')).toBe('owner__');
  });

  it('keeps deep contexts beside their root declaration', () => {
    const set = new DeclarationSet({ owner: 'x', owner__name: 'Ada', owner__address__city: 'Paris', age: 3 });

    expect(set.names()).toEqual(['owner', 'age']);
    expect(set.size).toBe(2);
    expect(set.get('owner')).toEqual({
      name: 'owner',
      declaration: 'x',
      context: { name: 'Ada', address__city: 'Paris' },
    });
    expect(set.get('age')?.context).toEqual({});
    expect(set.get('missing')).toBeUndefined();
  });

  it('joins contexts back into flat entries', () => {
    const set = new DeclarationSet([
      ['owner', 'x'],
      ['owner__name', 'Ada'],
    ]);

    expect([...set.entries()]).toEqual([
      ['owner', 'x'],
      ['owner__name', 'Ada'],
    ]);
    expect(set.copy().asRecord()).toEqual({ owner: 'x', owner__name: 'Ada' });
  });

  it('rejects a context for an undeclared root', () => {
    expect(() => new DeclarationSet({ a: 1, ghost__x: 2 })).toThrowFixtureError(
      ErrorCode.UNKNOWN_DEEP_CONTEXT,
      'Received deep context for unknown fields: ghost__x (known: a)'
    );
  });

  it('removes a declaration with its context', () => {
    const set = new DeclarationSet({ owner: 'x', owner__name: 'Ada', age: 3 });
    set.remove('owner');

    expect(set.asRecord()).toEqual({ age: 3 });
    expect(set.filter(['owner__name', 'age', 'age__unit'])).toEqual(['age', 'age__unit']);
  });

  it('orders constants first, then declarations by creation', () => {
    const first = lazyFunction(() => 1);
    const second = lazyFunction(() => 2);
    const set = new DeclarationSet({ b: second, a: first, c: 'constant', d: 'other' });

    expect(set.sorted()).toEqual(['c', 'd', 'a', 'b']);
  });
});

describe('parseDeclarations', () => {
  it('routes declarations by phase and contexts by root', () => {
    const hook = postGeneration(() => 1);
    const [pre, post] = parseDeclarations({ name: 'ada', hook, hook__level: 2 });

    expect(pre.asRecord()).toEqual({ name: 'ada' });
    expect(post.asRecord()).toEqual({ hook, hook__level: 2 });
  });

  it('turns a plain value for a post declaration into its extracted value', () => {
    const hook = postGeneration(() => 1);
    const [basePre, basePost] = parseDeclarations({ name: 'ada', hook, hook__level: 2 });

    const [pre, post] = parseDeclarations({ hook: 'value', name: 'grace' }, basePre, basePost);

    expect(post.get('hook')?.context).toEqual({ level: 2, '': 'value' });
    expect(pre.asRecord()).toEqual({ name: 'grace' });
    expect(basePost.get('hook')?.context).toEqual({ level: 2 });
  });

  it('lets a post declaration replace an inherited attribute', () => {
    const [basePre] = parseDeclarations({ audit: 'plain', name: 'ada' });
    const hook = postGeneration(() => 1);

    const [pre, post] = parseDeclarations({ audit: hook }, basePre);

    expect(pre.names()).toEqual(['name']);
    expect(post.names()).toEqual(['audit']);
    expect(basePre.has('audit')).toBe(true);
  });
});
