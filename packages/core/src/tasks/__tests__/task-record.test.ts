/**
 * @fileoverview TaskRecord Tests
 */

import { describe, it, expect } from 'vitest';
import {
  createTaskRecord,
  generateTaskId,
  normalizeDescription,
  normalizeTitle,
  withChanges,
} from '../task-record.js';
import { ValidationError } from '../../errors/index.js';

const CREATED_AT = new Date('2024-03-01T09:30:00.000Z');

describe('normalizeTitle', () => {
  it('trims surrounding whitespace', () => {
    expect(normalizeTitle('  Buy milk \n')).toBe('Buy milk');
  });

  it('rejects empty and whitespace-only titles', () => {
    expect(() => normalizeTitle('')).toThrow(ValidationError);
    expect(() => normalizeTitle('   ')).toThrow(ValidationError);
  });
});

describe('normalizeDescription', () => {
  it('trims text', () => {
    expect(normalizeDescription('  re: contract ')).toBe('re: contract');
  });

  it('turns blank, null and undefined into undefined', () => {
    expect(normalizeDescription('')).toBeUndefined();
    expect(normalizeDescription('  \t')).toBeUndefined();
    expect(normalizeDescription(null)).toBeUndefined();
    expect(normalizeDescription(undefined)).toBeUndefined();
  });
});

describe('createTaskRecord', () => {
  it('normalizes fields and defaults completed to false', () => {
    const record = createTaskRecord({
      id: 'task_1',
      title: ' Call Bob ',
      description: ' re: contract ',
      createdAt: CREATED_AT,
    });

    expect(record).toEqual({
      id: 'task_1',
      title: 'Call Bob',
      description: 're: contract',
      completed: false,
      createdAt: CREATED_AT,
    });
  });

  it('omits a blank description entirely', () => {
    const record = createTaskRecord({ id: 'task_1', title: 'Buy milk', description: '   ' });
    expect('description' in record).toBe(false);
  });

  it('returns a frozen record', () => {
    const record = createTaskRecord({ id: 'task_1', title: 'Buy milk' });
    expect(Object.isFrozen(record)).toBe(true);
  });

  it('rejects a blank title', () => {
    expect(() => createTaskRecord({ id: 'task_1', title: '  ' })).toThrow(ValidationError);
  });
});

describe('withChanges', () => {
  const original = createTaskRecord({
    id: 'task_1',
    title: 'Call Bob',
    description: 're: contract',
    createdAt: CREATED_AT,
  });

  it('keeps unspecified fields', () => {
    const updated = withChanges(original, { completed: true });

    expect(updated).toEqual({ ...original, completed: true });
    expect(updated).not.toBe(original);
    expect(original.completed).toBe(false);
  });

  it('never changes id or createdAt', () => {
    const updated = withChanges(original, { title: 'Call Robert', description: 'new notes' });

    expect(updated.id).toBe('task_1');
    expect(updated.createdAt).toBe(CREATED_AT);
    expect(updated.title).toBe('Call Robert');
    expect(updated.description).toBe('new notes');
  });

  it('clears the description with null or a blank string', () => {
    expect(withChanges(original, { description: null }).description).toBeUndefined();
    expect(withChanges(original, { description: '  ' }).description).toBeUndefined();
  });

  it('normalizes an overriding title and rejects a blank one', () => {
    expect(withChanges(original, { title: '  Email Bob  ' }).title).toBe('Email Bob');
    expect(() => withChanges(original, { title: ' ' })).toThrow(ValidationError);
  });
});

describe('generateTaskId', () => {
  it('produces distinct prefixed ids in a tight loop', () => {
    const ids = Array.from({ length: 1000 }, () => generateTaskId());

    expect(new Set(ids).size).toBe(1000);
    expect(ids.every((id) => id.startsWith('task_'))).toBe(true);
  });
});
