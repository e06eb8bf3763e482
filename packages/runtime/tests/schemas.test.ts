import { describe, expect, it } from 'vitest';
import { ValidationError } from '../errors.js';
import { commentCreateSchema, postPatchSchema, postWriteSchema, validate } from '../schemas.js';

function detailsOf(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error.details;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('post payloads', () => {
  it('requires title and body', () => {
    expect(detailsOf(() => validate(postWriteSchema, {}))).toEqual({
      title: ['This field is required.'],
      body: ['This field is required.'],
    });
  });

  it('treats a missing payload as empty', () => {
    expect(detailsOf(() => validate(postWriteSchema, undefined))).toEqual({
      title: ['This field is required.'],
      body: ['This field is required.'],
    });
  });

  it('rejects blank strings', () => {
    expect(detailsOf(() => validate(postWriteSchema, { title: '   ', body: 'ok' }))).toEqual({
      title: ['This field may not be blank.'],
    });
  });

  it('limits the title length', () => {
    expect(detailsOf(() => validate(postWriteSchema, { title: 'x'.repeat(201), body: 'ok' }))).toEqual({
      title: ['Ensure this field has no more than 200 characters.'],
    });
  });

  it('checks slug and flag types', () => {
    expect(
      detailsOf(() => validate(postWriteSchema, { title: 'a', body: 'b', slug: 'bad slug', is_published: 'yes' })),
    ).toEqual({
      slug: ['Enter a valid slug consisting of letters, numbers, underscores or hyphens.'],
      is_published: ['Must be a valid boolean.'],
    });
  });

  it('drops fields it does not know, including author', () => {
    expect(validate(postWriteSchema, { title: 'a', body: 'b', author: 7, id: 3 })).toEqual({ title: 'a', body: 'b' });
  });

  it('reports non-object payloads as a whole', () => {
    expect(detailsOf(() => validate(postWriteSchema, [1]))).toEqual({
      non_field_errors: ['Expected object, received array'],
    });
  });

  it('accepts partial updates', () => {
    expect(validate(postPatchSchema, { is_published: true })).toEqual({ is_published: true });
  });
});

describe('comment payloads', () => {
  it('wants a numeric post id', () => {
    expect(detailsOf(() => validate(commentCreateSchema, { post: '3', body: 'hi' }))).toEqual({
      post: ['Incorrect type. Expected pk value.'],
    });
  });

  it('never carries is_approved on create', () => {
    expect(validate(commentCreateSchema, { post: 3, body: 'hi', is_approved: true })).toEqual({ post: 3, body: 'hi' });
  });
});
