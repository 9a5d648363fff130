import { describe, it, expect } from 'vitest';
import {
  RESOURCE_DEPENDENCIES,
  creationOrder,
  parseStepName,
  selectKinds,
  teardownOrder,
  topologicalOrder
} from '../resource-graph.js';
import { requiredKeys } from '../steps.js';
import { ConfigurationError, GraphError } from '../../errors/index.js';

describe('resource graph', () => {
  it('should order creation so every dependency comes first', () => {
    const order = creationOrder();
    expect(order).toEqual([
      'KeyPair',
      'Network',
      'Gateway',
      'PublicSubnet',
      'PrivateSubnet',
      'RouteTable',
      'SecurityGroup',
      'Instance',
      'Bucket'
    ]);

    for (const kind of order) {
      for (const dependency of RESOURCE_DEPENDENCIES[kind]) {
        expect(order.indexOf(dependency)).toBeLessThan(order.indexOf(kind));
      }
    }
  });

  it('should tear down in exact reverse', () => {
    expect(teardownOrder()).toEqual([...creationOrder()].reverse());
    expect(teardownOrder()[0]).toBe('Bucket');
    expect(teardownOrder()[8]).toBe('KeyPair');
  });

  it('should break ties by declaration order', () => {
    const graph: Record<string, string[]> = { c: [], a: ['c'], b: [] };
    expect(topologicalOrder(graph, ['a', 'b', 'c'])).toEqual(['b', 'c', 'a']);
  });

  it('should reject cycles', () => {
    const graph: Record<string, string[]> = { a: ['b'], b: ['a'], c: [] };
    expect(() => topologicalOrder(graph, ['a', 'b', 'c'])).toThrow(GraphError);
    expect(() => topologicalOrder(graph, ['a', 'b', 'c'])).toThrow('Dependency cycle between: a, b');
  });

  it('should reject unknown dependencies', () => {
    const graph: Record<string, string[]> = { a: ['z'] };
    expect(() => topologicalOrder(graph, ['a'])).toThrow('a depends on unknown resource z');
  });

  it('should derive required keys from dependencies', () => {
    expect(requiredKeys('Network')).toEqual([]);
    expect(requiredKeys('Gateway')).toEqual(['VPC_ID']);
    expect(requiredKeys('RouteTable')).toEqual(['VPC_ID', 'IGW_ID', 'PUBLIC_SUBNET_ID']);
    expect(requiredKeys('Instance')).toEqual(['KEY_NAME', 'SECURITY_GROUP_ID', 'PUBLIC_SUBNET_ID']);
  });
});

describe('step selection', () => {
  it('should parse step names case-insensitively', () => {
    expect(parseStepName('route-table')).toBe('RouteTable');
    expect(parseStepName(' Public-Subnet ')).toBe('PublicSubnet');
  });

  it('should reject unknown step names with the valid list', () => {
    expect(() => parseStepName('database')).toThrow(ConfigurationError);
    expect(() => parseStepName('database')).toThrow(
      'Unknown step: database. Valid steps: key-pair, network, gateway, public-subnet, private-subnet, ' +
      'route-table, security-group, instance, bucket'
    );
  });

  it('should select everything by default', () => {
    expect(selectKinds().size).toBe(9);
  });

  it('should keep only the named step', () => {
    expect([...selectKinds({ only: 'bucket', skip: ['network'] })]).toEqual(['Bucket']);
  });

  it('should drop skipped steps', () => {
    const kinds = selectKinds({ skip: ['instance', 'bucket'] });
    expect(kinds.has('Instance')).toBe(false);
    expect(kinds.has('Bucket')).toBe(false);
    expect(kinds.size).toBe(7);
  });
});
