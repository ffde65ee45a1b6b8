/**
 * Example: Validating request payloads in a handler chain
 *
 * Run `npx tsx examples/handler-middleware.ts` to see it in action.
 */

import { ConsoleLogger, compose, createContext, schema, v, validate, validated } from '../src';

const createTodo = schema({ title: v.string().max(80), done: v.withDefault(v.boolean(), () => false) }, { name: 'CreateTodo' });

const logger = new ConsoleLogger('debug');

// Middleware form: the payload is replaced with the cleaned record
const viaMiddleware = compose([validate(createTodo)], (payload) => ({ created: payload }));

// Handler form: the handler receives the typed record
const viaHandler = compose(
  [],
  validated(createTodo, (todo) => ({ created: todo.title, done: todo.done }))
);

const main = async (): Promise<void> => {
  console.log(await viaMiddleware(createContext('CREATE_TODO', { title: ' Write docs ' }, logger)));
  console.log(await viaHandler(createContext('CREATE_TODO', { title: '' }, logger)));
};

main().catch((error: unknown) => {
  logger.error('Example failed', error instanceof Error ? error : undefined);
  process.exitCode = 1;
});
