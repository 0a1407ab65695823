import { describe, expect, it } from 'vitest';
import { field } from '../../fields';
import { shape } from '../../shape';
import { OpenApiGenerator } from '../generator';

const ERROR_RESPONSE = {
  description: 'Bad Request',
  content: {
    'application/json': {
      schema: {
        type: 'object',
        properties: {
          status: { type: 'integer' },
          message: { type: 'string' },
        },
      },
    },
  },
};

const AuthHeader = shape('AuthHeader', {
  token: field.string().header('Authorization').validate('required'),
});

const CreateItem = shape('CreateItem', {
  name: field.string().json('name').validate('required'),
});

const Todo = shape('Todo', {
  id: field.integer().json('id'),
  title: field.string().json('title'),
});

describe('OpenApiGenerator', () => {
  it('should merge a header shape and a body shape into one operation', () => {
    const generator = new OpenApiGenerator();
    generator.addEndpoint('POST', '/merge', [AuthHeader, CreateItem]);

    expect(generator.getOperation('POST', '/merge')).toEqual({
      summary: 'POST /merge',
      responses: {
        '200': { description: 'Success' },
        '400': ERROR_RESPONSE,
      },
      parameters: [
        {
          name: 'Authorization',
          in: 'header',
          required: true,
          schema: { type: 'string' },
        },
      ],
      requestBody: {
        description: 'Request body',
        required: true,
        content: {
          'application/json': {
            schema: {
              type: 'object',
              properties: {
                name: { type: 'string', description: 'Validation: required' },
              },
              required: ['name'],
            },
          },
        },
      },
    });
  });

  it('should document query parameters only for GET and HEAD', () => {
    const Search = shape('Search', {
      q: field.string().form('q'),
    });
    const generator = new OpenApiGenerator();
    generator.addEndpoint('GET', '/search', [Search]);
    generator.addEndpoint('POST', '/search', [Search]);

    expect(generator.getOperation('GET', '/search')?.parameters).toEqual([
      { name: 'q', in: 'query', required: false, schema: { type: 'string' } },
    ]);

    const post = generator.getOperation('POST', '/search');
    expect(post?.parameters).toBeUndefined();
    expect(post?.requestBody).toEqual({
      description: 'Request body',
      required: true,
      content: {
        'application/x-www-form-urlencoded': {
          schema: { type: 'object', properties: { q: { type: 'string' } } },
        },
      },
    });
  });

  it('should keep the first of duplicate parameters across shapes', () => {
    const Paging = shape('Paging', {
      limit: field.integer().form('limit').validate('required'),
    });
    const Filter = shape('Filter', {
      limit: field.string().form('limit'),
      status: field.string().form('status'),
    });
    const generator = new OpenApiGenerator();
    generator.addEndpoint('GET', '/todos', [Paging, Filter]);

    expect(generator.getOperation('GET', '/todos')?.parameters).toEqual([
      {
        name: 'limit',
        in: 'query',
        required: true,
        schema: { type: 'integer', format: 'int64' },
      },
      {
        name: 'status',
        in: 'query',
        required: false,
        schema: { type: 'string' },
      },
    ]);
  });

  it('should merge body schemas that share a content type', () => {
    const Meta = shape('Meta', {
      name: field.string().json('name'),
      tags: field.array(field.string()).json('tags'),
    });
    const generator = new OpenApiGenerator();
    generator.addEndpoint('PUT', '/items/:id', [CreateItem, Meta]);

    const operation = generator.getOperation('PUT', '/items/:id');
    expect(operation?.requestBody).toEqual({
      description: 'Request body',
      required: true,
      content: {
        'application/json': {
          schema: {
            type: 'object',
            properties: {
              name: { type: 'string' },
              tags: { type: 'array', items: { type: 'string' } },
            },
            required: ['name'],
          },
        },
      },
    });
  });

  it('should offer every content type of a mixed shape', () => {
    const Note = shape('Note', {
      title: field.string().form('title'),
      body: field.string().json('body'),
    });
    const generator = new OpenApiGenerator();
    generator.addEndpoint('POST', '/notes', [Note]);

    const schema = {
      type: 'object',
      properties: { title: { type: 'string' }, body: { type: 'string' } },
    };
    expect(generator.getOperation('POST', '/notes')?.requestBody).toEqual({
      description: 'Request body',
      required: true,
      content: {
        'application/x-www-form-urlencoded': { schema },
        'application/json': { schema },
      },
    });
  });

  it('should document uploads as multipart', () => {
    const Upload = shape('Upload', {
      title: field.string().form('title').validate('required'),
      file: field.file().form('file'),
    });
    const generator = new OpenApiGenerator();
    generator.addEndpoint('POST', '/upload', [Upload]);

    expect(generator.getOperation('POST', '/upload')?.requestBody).toEqual({
      description: 'Request body',
      required: true,
      content: {
        'multipart/form-data': {
          schema: {
            type: 'object',
            properties: {
              title: { type: 'string', description: 'Validation: required' },
              file: { type: 'string', format: 'binary' },
            },
            required: ['title'],
          },
        },
      },
    });
  });

  it('should default to a JSON body for shapes without body fields', () => {
    const GetTodo = shape('GetTodo', { id: field.integer().uri('id') });
    const generator = new OpenApiGenerator();
    generator.addEndpoint('DELETE', '/todos/:id', [GetTodo]);
    generator.addEndpoint('POST', '/logout', [AuthHeader]);

    const remove = generator.getOperation('DELETE', '/todos/:id');
    expect(remove?.parameters).toEqual([
      {
        name: 'id',
        in: 'path',
        required: true,
        schema: { type: 'integer', format: 'int64' },
      },
    ]);
    expect(remove?.requestBody).toEqual({
      description: 'Request body',
      required: true,
      content: { 'application/json': { schema: { type: 'object' } } },
    });
    expect(generator.getOperation('POST', '/logout')?.requestBody).toEqual({
      description: 'Request body',
      required: true,
      content: { 'application/json': { schema: { type: 'object' } } },
    });
    expect(
      Object.keys(generator.generateDocument().components?.schemas ?? {}),
    ).toEqual(['GetTodo', 'AuthHeader']);
  });

  it('should leave out the body when a route has no request shapes', () => {
    const generator = new OpenApiGenerator();
    generator.addEndpoint('POST', '/ping', []);

    expect(generator.getOperation('POST', '/ping')?.requestBody).toBeUndefined();
  });

  it('should not hand a named schema to an anonymous shape', () => {
    const generator = new OpenApiGenerator();
    generator.addEndpoint('POST', '/a', [
      shape('Anonymous2', { x: field.string().json('x') }),
    ]);
    generator.addEndpoint('POST', '/b', [
      shape({ y: field.string().json('y') }),
    ]);
    generator.addEndpoint('POST', '/c', [
      shape({ z: field.string().json('z') }),
    ]);

    expect(generator.getOperation('POST', '/c')?.requestBody).toEqual({
      description: 'Request body',
      required: true,
      content: {
        'application/json': {
          schema: { type: 'object', properties: { z: { type: 'string' } } },
        },
      },
    });
    expect(
      Object.keys(generator.generateDocument().components?.schemas ?? {}),
    ).toEqual(['Anonymous2', 'Anonymous', 'Anonymous3']);
  });

  it('should replace an operation registered twice', () => {
    const First = shape('First', { a: field.string().form('a') });
    const Second = shape('Second', { b: field.string().form('b') });
    const generator = new OpenApiGenerator();

    generator.addEndpoint('GET', '/items', [First]);
    generator.addEndpoint('GET', '/items', [Second]);

    expect(generator.getOperation('GET', '/items')?.parameters).toEqual([
      { name: 'b', in: 'query', required: false, schema: { type: 'string' } },
    ]);
  });

  it('should describe shape and field responses', () => {
    const generator = new OpenApiGenerator();
    generator.addEndpoint('GET', '/todos/:id', [], Todo);
    generator.addEndpoint('GET', '/todos', [], field.array(field.shape(Todo)));

    const todoSchema = {
      type: 'object',
      properties: {
        id: { type: 'integer', format: 'int64' },
        title: { type: 'string' },
      },
    };
    expect(
      generator.getOperation('GET', '/todos/:id')?.responses['200'],
    ).toEqual({
      description: 'Success',
      content: { 'application/json': { schema: todoSchema } },
    });
    expect(generator.getOperation('GET', '/todos')?.responses['200']).toEqual({
      description: 'Success',
      content: {
        'application/json': { schema: { type: 'array', items: todoSchema } },
      },
    });
  });

  describe('generateDocument', () => {
    it('should assemble paths, info and components', () => {
      const GetTodo = shape('GetTodo', { id: field.integer().uri('id') });
      const generator = new OpenApiGenerator({
        title: 'Todo API',
        version: '2.0.0',
      });
      generator.addEndpoint('GET', '/todos/:id', [GetTodo], Todo);
      generator.addEndpoint('DELETE', '/todos/:id', [GetTodo]);

      const document = generator.generateDocument();

      expect(document.openapi).toBe('3.0.0');
      expect(document.info).toEqual({
        title: 'Todo API',
        version: '2.0.0',
        description: 'Auto-generated API documentation',
      });
      expect(Object.keys(document.paths)).toEqual(['/todos/{id}']);
      expect(Object.keys(document.paths['/todos/{id}'] ?? {})).toEqual([
        'get',
        'delete',
      ]);
      expect(Object.keys(document.components?.schemas ?? {})).toEqual([
        'Todo',
        'GetTodo',
      ]);
    });

    it('should be structurally identical across calls', () => {
      const generator = new OpenApiGenerator();
      generator.addEndpoint('POST', '/merge', [AuthHeader, CreateItem], Todo);

      const first = generator.generateDocument();
      const second = generator.generateDocument();

      expect(second).toEqual(first);
      expect(second).not.toBe(first);
    });

    it('should reflect routes added after an earlier document', () => {
      const generator = new OpenApiGenerator();
      generator.addEndpoint('GET', '/a', []);
      const before = generator.generateDocument();

      generator.addEndpoint('GET', '/b', []);
      const after = generator.generateDocument();

      expect(Object.keys(before.paths)).toEqual(['/a']);
      expect(Object.keys(after.paths)).toEqual(['/a', '/b']);
    });

    it('should name anonymous shapes in the components', () => {
      const generator = new OpenApiGenerator();
      generator.addEndpoint('POST', '/anon', [
        shape({ value: field.string().json('value') }),
      ]);

      expect(
        Object.keys(generator.generateDocument().components?.schemas ?? {}),
      ).toEqual(['Anonymous']);
    });

    it('should serialize with two-space indentation', () => {
      const generator = new OpenApiGenerator({ title: 'Todo API' });
      generator.addEndpoint('GET', '/health', []);

      expect(generator.toJSON()).toBe(
        JSON.stringify(generator.generateDocument(), null, 2),
      );
      expect(generator.toJSON().startsWith('{\n  "openapi": "3.0.0",')).toBe(
        true,
      );
    });
  });

  it('should use the API title for the page unless one is given', () => {
    expect(new OpenApiGenerator({ title: 'Todo API' }).pageTitle).toBe(
      'Todo API',
    );
    expect(
      new OpenApiGenerator({ title: 'Todo API', pageTitle: 'Todo Docs' })
        .pageTitle,
    ).toBe('Todo Docs');
  });
});
