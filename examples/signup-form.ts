/**
 * Example: Validating a signup form
 *
 * Run `npx tsx examples/signup-form.ts` to see it in action.
 */

import { ConsoleLogger, ValidationError, schema, v } from '../src';

const signup = schema(
  {
    username: v.string().min(3).pattern(/[a-zA-Z_]+/).describe({ label: 'Username' }),
    email: v.string().email(),
    password: v.string().min(8),
    age: v.int().min(13),
    newsletter: v.withDefault(v.boolean(), () => false),
    referrer: v.optional(v.string()),
  },
  { name: 'Signup', logger: new ConsoleLogger('debug') }
);

// ✅ Strings are trimmed, "20" becomes 20, missing fields get their default
const user = signup.validate({
  username: ' new_user ',
  email: 'user@example.com',
  password: 'test-secret',
  age: '20',
});
console.log('Cleaned:', user);

// ❌ Every failure is reported at once
try {
  signup.validate({ username: 'invalid format', email: 'nope', password: 'short' });
} catch (error) {
  if (!(error instanceof ValidationError)) {
    throw error;
  }
  console.log(error.message);
  for (const issue of error.flatten()) {
    console.log(`  ${issue.path}: ${issue.message} (${issue.kind})`);
  }
}

// Field documentation, for forms or API docs
console.table(signup.describe());
