import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { Resource } from './resource.js';

const COMPONENT = {
  id: 'c1',
  name: 'API',
  status: 'operational',
  position: 1,
  showcase: false,
  description: null,
  group: { id: 'g1', name: 'Backend' },
  tags: ['core', { label: 'edge' }],
};

describe('Resource', () => {
  it('looks up fields by key', () => {
    const resource = new Resource(COMPONENT);

    expect(resource.get('id')).toBe('c1');
    expect(resource.get('position')).toBe(1);
    expect(resource.get('showcase')).toBe(false);
    expect(resource.get('description')).toBeNull();
    expect(resource.get('missing')).toBeUndefined();
  });

  it('tells absent fields from null ones', () => {
    const resource = new Resource(COMPONENT);

    expect(resource.has('description')).toBe(true);
    expect(resource.has('missing')).toBe(false);
  });

  it('keeps keys in response order', () => {
    const resource = new Resource(COMPONENT);

    expect(resource.size).toBe(8);
    expect(resource.keys()).toEqual(['id', 'name', 'status', 'position', 'showcase', 'description', 'group', 'tags']);
    expect([...resource][0]).toEqual(['id', 'c1']);
    expect(resource.entries()[1]).toEqual(['name', 'API']);
  });

  it('turns nested objects into resources', () => {
    const resource = new Resource(COMPONENT);
    const group = resource.get('group');

    expect(group).toBeInstanceOf(Resource);
    expect(group instanceof Resource && group.get('name')).toBe('Backend');

    const tags = resource.get('tags');
    expect(Array.isArray(tags) && tags[0]).toBe('core');
    expect(Array.isArray(tags) && tags[1] instanceof Resource).toBe(true);
  });

  it('serializes back to the decoded object', () => {
    const resource = new Resource(COMPONENT);

    expect(resource.toJSON()).toEqual(COMPONENT);
    expect(JSON.stringify(resource)).toBe(JSON.stringify(COMPONENT));
  });

  it('is empty by default', () => {
    expect(new Resource().size).toBe(0);
    expect(new Resource().toJSON()).toEqual({});
  });

  it('validates into a typed structure', async () => {
    const schema = z.object({ id: z.string(), name: z.string(), group: z.object({ id: z.string() }) });

    const [err, component] = await new Resource(COMPONENT).validate(schema);

    expect(err).toBeNull();
    expect(component).toEqual({ id: 'c1', name: 'API', group: { id: 'g1' } });
  });

  it('returns a ValidationError when the schema does not match', async () => {
    const [err, component] = await new Resource(COMPONENT).validate(z.object({ id: z.number() }));

    expect(component).toBeNull();
    expect(err).toBeInstanceOf(ValidationError);
  });
});
