import { describe, it, expect } from 'vitest';
import * as docketCore from './index.js';

describe('docket-core public API', () => {
  describe('database exports', () => {
    it('exports connection and transaction helpers', () => {
      expect(typeof docketCore.createConnection).toBe('function');
      expect(typeof docketCore.withWriteTransaction).toBe('function');
      expect(docketCore.MEMORY_DB).toBe(':memory:');
    });

    it('exports migrations', () => {
      expect(typeof docketCore.runMigrationsWithRollback).toBe('function');
      expect(docketCore.MIGRATIONS.length).toBeGreaterThan(0);
    });
  });

  describe('error exports', () => {
    it('exports the domain error family', () => {
      const err = new docketCore.EmptyQueueError();
      expect(err).toBeInstanceOf(docketCore.DomainError);
      expect(docketCore.isDomainError(err)).toBe(true);
    });
  });

  describe('event exports', () => {
    it('exports EventType and Lifecycle enums', () => {
      expect(docketCore.EventType.TimerStarted).toBe('timer_started');
      expect(docketCore.Lifecycle.Cancelled).toBe('cancelled');
    });
  });

  describe('classification exports', () => {
    it('exports the default table and classify', () => {
      expect(docketCore.DEFAULT_STAGE_RULES).toHaveLength(8);
      expect(
        docketCore.classify({
          lifecycle: docketCore.Lifecycle.Open,
          timerOn: false,
          waiting: false,
          queued: true,
          history: false,
        })
      ).toBe(docketCore.Stage.Planned);
    });
  });

  describe('service exports', () => {
    it('exports the service container', () => {
      const db = docketCore.createConnection(docketCore.MEMORY_DB);
      const services = docketCore.createServices(db);

      expect(services.queueService).toBeInstanceOf(docketCore.QueueService);
      expect(services.timerService).toBeInstanceOf(docketCore.TimerService);
      expect(services.handoffService).toBeInstanceOf(docketCore.HandoffService);
      expect(services.taskService).toBeInstanceOf(docketCore.TaskService);
      expect(services.microPolicy).toEqual(docketCore.DEFAULT_MICRO_POLICY);
      db.close();
    });
  });
});
