import {
  App,
  type ServerConfig,
  created,
  handle,
  middleware,
  noContent,
} from '@shapekit/api';
import { NotFoundError, UnauthorizedError } from '@shapekit/errors';
import type { Logger } from '@shapekit/logger';
import { type InferShape, field, shape } from '@shapekit/schema';

export const Todo = shape('Todo', {
  id: field.integer().json('id'),
  title: field.string().json('title'),
  done: field.boolean().json('done'),
});

type TodoValue = InferShape<typeof Todo>;

const Health = shape('Health', {});

const ApiKey = shape('ApiKey', {
  key: field.string().header('X-Api-Key').validate('required'),
});

const ListTodos = shape('ListTodos', {
  limit: field.integer().form('limit').validate('omitempty,max=50'),
});

const TodoId = shape('TodoId', {
  id: field.integer().uri('id').validate('required'),
});

const CreateTodo = shape('CreateTodo', {
  title: field.string().json('title').validate('required,max=100'),
});

const UpdateTodo = shape('UpdateTodo', {
  id: field.integer().uri('id').validate('required'),
  title: field.string().json('title').validate('omitempty,max=100'),
  done: field.boolean().json('done'),
});

export interface TodoApiOptions {
  /** Value the X-Api-Key header must carry on /todos routes */
  apiKey: string;
  logger?: Logger;
  docs?: ServerConfig['docs'];
}

/**
 * In-memory todo service: a public health check and a key-protected
 * /todos group, documented at /docs.
 */
export function createTodoApi({ apiKey, logger, docs }: TodoApiOptions): App {
  const todos = new Map<number, TodoValue>();
  let nextId = 1;

  const app = new App({ logger });
  if (docs?.enabled ?? true) {
    app.withDocs({
      title: 'Todo API',
      version: '1.0.0',
      openapiPath: docs?.openapiPath,
      docsPath: docs?.path,
    });
  }

  const requireKey = middleware(ApiKey, (_ctx, req) => {
    if (req.key !== apiKey) {
      throw new UnauthorizedError('Invalid API key');
    }
  });

  const find = (id: number): TodoValue => {
    const todo = todos.get(id);
    if (!todo) {
      throw new NotFoundError(`Todo ${id} not found`);
    }
    return todo;
  };

  app.get('/health', handle(Health, undefined, () => ({ status: 'ok' })));

  const api = app.group('/todos', requireKey);

  api.get(
    '/',
    handle(ListTodos, field.array(field.shape(Todo)), (_ctx, req) => {
      const all = [...todos.values()];
      return req.limit > 0 ? all.slice(0, req.limit) : all;
    }),
  );

  api.get(
    '/:id',
    handle(TodoId, Todo, (_ctx, req) => find(req.id)),
  );

  api.post(
    '/',
    handle(CreateTodo, Todo, (ctx, req) => {
      const todo = { id: nextId++, title: req.title, done: false };
      todos.set(todo.id, todo);
      ctx.logger.info({ id: todo.id }, 'Todo created');
      return created(ctx, todo);
    }),
  );

  api.patch(
    '/:id',
    handle(UpdateTodo, Todo, (_ctx, req) => {
      const existing = find(req.id);
      const updated = {
        ...existing,
        title: req.title || existing.title,
        done: req.done,
      };
      todos.set(updated.id, updated);
      return updated;
    }),
  );

  api.delete(
    '/:id',
    handle(TodoId, undefined, (ctx, req) => {
      find(req.id);
      todos.delete(req.id);
      return noContent(ctx);
    }),
  );

  return app;
}
