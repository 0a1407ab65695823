import { loadServerConfig } from '@shapekit/api';
import { createLogger } from '@shapekit/logger/pino';
import { createTodoApi } from './todo-api';

const config = loadServerConfig();

const logger = createLogger({
  name: 'todo-api',
  level: config.logLevel,
  pretty: config.nodeEnv !== 'production',
  redact: true,
});

const app = createTodoApi({
  apiKey: process.env.TODO_API_KEY ?? 'test-secret',
  logger,
  docs: config.docs,
});

app.start({ port: config.port, hostname: config.host });
