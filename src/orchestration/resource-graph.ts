import { RESOURCE_KINDS, ResourceKind } from '../types/index.js';
import { ConfigurationError, GraphError } from '../errors/index.js';

export type DependencyGraph<K extends string = ResourceKind> = Readonly<Record<K, readonly K[]>>;

export const RESOURCE_DEPENDENCIES: DependencyGraph = {
  KeyPair: [],
  Network: [],
  Gateway: ['Network'],
  PublicSubnet: ['Network'],
  PrivateSubnet: ['Network'],
  RouteTable: ['Network', 'Gateway', 'PublicSubnet'],
  SecurityGroup: ['Network'],
  Instance: ['KeyPair', 'SecurityGroup', 'PublicSubnet'],
  Bucket: []
};

export const STEP_NAMES: Readonly<Record<ResourceKind, string>> = {
  KeyPair: 'key-pair',
  Network: 'network',
  Gateway: 'gateway',
  PublicSubnet: 'public-subnet',
  PrivateSubnet: 'private-subnet',
  RouteTable: 'route-table',
  SecurityGroup: 'security-group',
  Instance: 'instance',
  Bucket: 'bucket'
};

/**
 * Kahn's algorithm. Among kinds whose dependencies are all placed, the one
 * declared first goes next, so the order is stable for a given declaration.
 */
export function topologicalOrder<K extends string>(graph: DependencyGraph<K>, declared: readonly K[]): K[] {
  const known = new Set<string>(declared);
  for (const node of declared) {
    for (const dependency of graph[node]) {
      if (!known.has(dependency)) {
        throw new GraphError(`${node} depends on unknown resource ${dependency}`);
      }
    }
  }

  const placed = new Set<K>();
  const order: K[] = [];

  while (order.length < declared.length) {
    const next = declared.find(node =>
      !placed.has(node) && graph[node].every(dependency => placed.has(dependency))
    );

    if (next === undefined) {
      const remaining = declared.filter(node => !placed.has(node));
      throw new GraphError(`Dependency cycle between: ${remaining.join(', ')}`);
    }

    placed.add(next);
    order.push(next);
  }

  return order;
}

export function creationOrder(graph: DependencyGraph = RESOURCE_DEPENDENCIES): ResourceKind[] {
  return topologicalOrder(graph, RESOURCE_KINDS);
}

export function teardownOrder(graph: DependencyGraph = RESOURCE_DEPENDENCIES): ResourceKind[] {
  return creationOrder(graph).reverse();
}

export function parseStepName(name: string): ResourceKind {
  const normalized = name.trim().toLowerCase();
  const kind = RESOURCE_KINDS.find(candidate => STEP_NAMES[candidate] === normalized);
  if (!kind) {
    throw new ConfigurationError(
      `Unknown step: ${name}. Valid steps: ${RESOURCE_KINDS.map(candidate => STEP_NAMES[candidate]).join(', ')}`
    );
  }
  return kind;
}

export interface StepSelection {
  only?: string;
  skip?: string[];
}

/**
 * Resolve --only / --skip into the set of kinds that run. Unknown names throw.
 */
export function selectKinds(selection: StepSelection = {}): Set<ResourceKind> {
  if (selection.only !== undefined) {
    return new Set([parseStepName(selection.only)]);
  }

  const skipped = new Set((selection.skip ?? []).map(parseStepName));
  return new Set(RESOURCE_KINDS.filter(kind => !skipped.has(kind)));
}
