import type { TypeDescriptor } from '@typedwire/core';
import { t } from '../src/index.js';

export interface FruitAmount {
  fruit: string;
  amount: number;
}

export interface Basket {
  fruits: FruitAmount[];
  note?: string;
}

export const FruitAmountType = t.product<FruitAmount>('FruitAmount', {
  fruit: t.string(),
  amount: t.integer(),
});

export const BasketType = t.product<Basket>('Basket', {
  fruits: t.array(FruitAmountType),
  note: t.optional(t.string()),
});

export interface Person {
  name: string;
}

export interface Organization {
  title: string;
}

export type Entity = Person | Organization;

export const PersonType = t.product<Person>('Person', { name: t.string() });

export const OrganizationType = t.product<Organization>('Organization', { title: t.string() });

export const EntityType = t.coproduct<Entity>('Entity', [
  { label: 'person', type: PersonType },
  { label: 'org', type: OrganizationType },
]);

export interface TreeNode {
  value: number;
  children: TreeNode[];
}

export const TreeNodeType: TypeDescriptor<TreeNode> = t.product<TreeNode>('TreeNode', {
  value: t.integer(),
  children: t.array(t.lazy(() => TreeNodeType)),
});
