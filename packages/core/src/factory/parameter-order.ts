/**
 * Evaluation order of parameters.
 *
 * Parameters only declare reverse dependencies (the parameters they read);
 * the closure of those is computed per parameter, a parameter found in its
 * own closure is cyclic.
 */

import type { Parameter } from '../declarations/parameters.js';
import { CyclicDefinitionError } from '../types/errors.js';

/**
 * Transitive reverse dependencies of every parameter
 */
export function collectDeepRevdeps(
  parameters: ReadonlyMap<string, Parameter>
): Map<string, Set<string>> {
  const names = [...parameters.keys()];
  const direct = new Map(
    names.map((name) => [name, parameters.get(name)?.getRevdeps(names) ?? []] as const)
  );

  const deep = new Map<string, Set<string>>();
  for (const name of names) {
    const closure = new Set<string>();
    const queue = [...(direct.get(name) ?? [])];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || closure.has(current)) continue;
      closure.add(current);
      queue.push(...(direct.get(current) ?? []));
    }
    deep.set(name, closure);
  }
  return deep;
}

/**
 * Order parameters so each follows everything it reads, keeping
 * declaration order otherwise. Throws CyclicDefinitionError naming the
 * factory and the sorted cyclic parameters.
 */
export function resolveParameterOrder(
  factory: string,
  parameters: ReadonlyMap<string, Parameter>
): string[] {
  const deep = collectDeepRevdeps(parameters);
  const cyclic = [...deep]
    .filter(([name, closure]) => closure.has(name))
    .map(([name]) => name)
    .sort();
  if (cyclic.length > 0) {
    throw new CyclicDefinitionError({
      message: `Cyclic definition detected on ${factory}; params around ${cyclic.join(', ')}`,
      context: { factory, attributes: cyclic },
    });
  }

  const ordered: string[] = [];
  const placed = new Set<string>();
  const remaining = [...parameters.keys()];
  while (remaining.length > 0) {
    const index = remaining.findIndex((name) =>
      [...(deep.get(name) ?? [])].every((dep) => placed.has(dep))
    );
    const [name] = remaining.splice(index, 1);
    ordered.push(name);
    placed.add(name);
  }
  return ordered;
}
