/**
 * Error Taxonomy Tests
 */

import { describe, it, expect } from 'vitest';
import {
  FlowError,
  ValidationError,
  CycleError,
  StructuralError,
  ExecutionError,
  WorkflowNotFoundError,
  ConfigurationError,
  isFlowError,
  wrapError,
} from '../errors.js';

describe('Error Taxonomy', () => {
  describe('construction errors', () => {
    it('should carry the validation code', () => {
      const error = new ValidationError('node missing', { context: { missing: ['a'] } });

      expect(error).toBeInstanceOf(FlowError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe('ValidationError');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.context).toEqual({ missing: ['a'] });
    });

    it('should describe both ends of a rejected cycle', () => {
      const error = new CycleError('save', 'input');

      expect(error.message).toBe("circular detection from 'save' to 'input'");
      expect(error.code).toBe('CYCLE_DETECTED');
      expect(error.from).toBe('save');
      expect(error.to).toBe('input');
      expect(error.context).toEqual({ from: 'save', to: 'input' });
    });

    it('should record the offending node of a structural error', () => {
      const error = new StructuralError('already wired', { nodeKey: 'input' });

      expect(error.code).toBe('STRUCTURAL_ERROR');
      expect(error.nodeKey).toBe('input');
    });
  });

  describe('ExecutionError', () => {
    it('should take its message and cause from the failing action', () => {
      const cause = new Error('disk full');
      const error = new ExecutionError('save-user', cause, { workflow: 'add-user' });

      expect(error.message).toBe('disk full');
      expect(error.cause).toBe(cause);
      expect(error.nodeKey).toBe('save-user');
      expect(error.workflow).toBe('add-user');
      expect(error.context).toEqual({ nodeKey: 'save-user', workflow: 'add-user' });
    });

    it('should stringify non-Error causes', () => {
      const error = new ExecutionError('save-user', 'boom');

      expect(error.message).toBe('boom');
      expect(error.cause).toBeUndefined();
    });
  });

  describe('WorkflowNotFoundError', () => {
    it('should name the missing workflow', () => {
      const error = new WorkflowNotFoundError('add-user');

      expect(error.message).toBe("workflow 'add-user' not found");
      expect(error.code).toBe('NOT_FOUND');
      expect(error.workflowName).toBe('add-user');
    });
  });

  describe('toJSON', () => {
    it('should serialize code, message and cause', () => {
      const error = new ExecutionError('n1', new Error('inner'));
      const json = error.toJSON();

      expect(json.name).toBe('ExecutionError');
      expect(json.code).toBe('EXECUTION_ERROR');
      expect(json.message).toBe('inner');
      expect(json.cause).toBe('inner');
      expect(json.timestamp).toBe(error.timestamp.toISOString());
    });
  });

  describe('helpers', () => {
    it('should recognise flow errors', () => {
      expect(isFlowError(new ConfigurationError('bad'))).toBe(true);
      expect(isFlowError(new Error('plain'))).toBe(false);
      expect(isFlowError('string')).toBe(false);
    });

    it('should return flow errors unchanged when wrapping', () => {
      const original = new ValidationError('x');
      expect(wrapError(original)).toBe(original);
    });

    it('should wrap plain errors with a cause', () => {
      const plain = new Error('plain');
      const wrapped = wrapError(plain);

      expect(wrapped.code).toBe('UNHANDLED_ERROR');
      expect(wrapped.message).toBe('plain');
      expect(wrapped.cause).toBe(plain);
    });

    it('should wrap non-errors with the requested code', () => {
      const wrapped = wrapError(42, 'EXECUTION_ERROR');

      expect(wrapped.code).toBe('EXECUTION_ERROR');
      expect(wrapped.message).toBe('42');
    });
  });
});
