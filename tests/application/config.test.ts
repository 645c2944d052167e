import { describe, it, expect } from 'vitest';
import { DEFAULT_ORCHESTRATOR_CONFIG, loadOrchestratorConfig } from '../../src/application/config.js';
import { ConfigError } from '../../src/application/errors.js';

describe('loadOrchestratorConfig', () => {
  it('returns the defaults for an empty environment', () => {
    expect(loadOrchestratorConfig({})).toEqual(DEFAULT_ORCHESTRATOR_CONFIG);
  });

  it('coerces numeric strings', () => {
    const config = loadOrchestratorConfig({
      WORKFLOW_REQUEST_TIMEOUT_MS: '2500',
      WORKFLOW_MAX_RETRIES: '0',
      BUS_QUEUE_DEPTH: '50',
    });

    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.maxRetries).toBe(0);
    expect(config.busQueueDepth).toBe(50);
  });

  it('treats empty strings as unset', () => {
    expect(loadOrchestratorConfig({ WORKFLOW_POLL_INTERVAL_MS: '  ' }).pollIntervalMs).toBe(5000);
  });

  it('rejects invalid values with every offending variable', () => {
    let caught: unknown;
    try {
      loadOrchestratorConfig({ WORKFLOW_POLL_INTERVAL_MS: 'soon', WORKFLOW_MAX_RETRIES: '-1' });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^WORKFLOW_POLL_INTERVAL_MS: /);
      expect(caught.issues[1]).toMatch(/^WORKFLOW_MAX_RETRIES: /);
    }
  });

  it('rejects a max delay below the base delay', () => {
    expect(() => loadOrchestratorConfig({
      WORKFLOW_RETRY_BASE_DELAY_MS: '5000',
      WORKFLOW_RETRY_MAX_DELAY_MS: '1000',
    })).toThrow('Invalid configuration: WORKFLOW_RETRY_MAX_DELAY_MS: must not be below WORKFLOW_RETRY_BASE_DELAY_MS');
  });
});
