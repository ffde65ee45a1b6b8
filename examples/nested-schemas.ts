/**
 * Example: Nested, recursive and tagged data
 *
 * Run `npx tsx examples/nested-schemas.ts` to see it in action.
 */

import { schema, v } from '../src';
import type { Cleaned, Schema } from '../src';

const address = schema({ street: v.string(), city: v.string(), zip: v.string().pattern(/\d{5}/) }, { name: 'Address' });

const customer = schema(
  {
    name: v.string(),
    addresses: v.list(v.nested(address)).min(1),
    contact: v.either({ email: v.string().email(), phone: v.string().pattern(/\+?\d{6,15}/) }),
    scores: v.map(v.float().min(0)),
    tags: v.set(v.string()),
    tier: v.enumOf(['free', 'pro'] as const),
  },
  { name: 'Customer' }
);

const result = customer.safeValidate({
  name: 'Ada',
  addresses: [{ street: 'Main St 1', city: 'Springfield', zip: '1234' }],
  contact: '+15550100',
  scores: { en: '4.5', fr: -1 },
  tags: ['a', 'a'],
  tier: 'gold',
});

if (!result.success) {
  // addresses[0].zip, scores[fr] and tier are reported, each under its own path
  for (const issue of result.errors) {
    console.log(issue);
  }
}

// Self-referencing schemas resolve lazily
interface Category {
  name: string;
  children: readonly Cleaned<Category>[];
}

const category: Schema<Category> = schema({
  name: v.string(),
  children: v.withDefault(v.list(v.nested(() => category)), () => []),
});

const tree = category.validate({ name: 'root', children: [{ name: 'leaf' }] });
console.log(tree.children[0].name);

// Serialized records validate back to equal records
console.log(category.serialize(tree));

// Tagged unions pick the schema from one field
const circle = schema({ kind: v.tag('circle'), radius: v.float().gt(0) }, { name: 'Circle' });
const square = schema({ kind: v.tag('square'), side: v.float().gt(0) }, { name: 'Square' });
const drawing = schema({ shapes: v.list(v.tagged('kind', circle, square)), at: v.time() });

const picture = drawing.validate({
  shapes: [
    { kind: 'circle', radius: 2 },
    { kind: 'square', side: '3' },
  ],
  at: '09:30',
});
console.log(picture.shapes.map((shape) => shape.kind), drawing.serialize(picture));
