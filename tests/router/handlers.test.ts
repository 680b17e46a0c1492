import { describe, it, expect } from 'vitest';
import {
  classifyLogEntry,
  describeServiceStatus,
  handleDebugMessage,
  handleLogEntry,
  handleNetworkDiscovery,
  handlePerformanceMetrics,
  handleServiceStatus,
  handleUnknown,
  handleWelcome,
  type HandlerContext,
} from '../../src/router/handlers.js';
import { AggregateStore } from '../../src/state/aggregate-store.js';
import type {
  EnvelopeFields,
  NetworkDiscoveryMessage,
  ServiceStatusMessage,
} from '../../src/protocol/messages.js';

const envelope: EnvelopeFields = { time: '10:30:45', timestampPresent: true, source: 'Agent' };

function createContext(): HandlerContext {
  return { store: new AggregateStore(), now: () => 1_700_000_000_000 };
}

function servicePayload(overrides: Partial<ServiceStatusMessage['payload']> = {}): ServiceStatusMessage['payload'] {
  return {
    isInstalled: false,
    isRunning: false,
    isInstalling: false,
    isUninstalling: false,
    lastError: '',
    installationProgress: '',
    ...overrides,
  };
}

describe('handleWelcome', () => {
  it('renders server, version and capabilities', () => {
    const entry = handleWelcome({
      ...envelope,
      type: 'welcome',
      payload: { server: 'Mgmt', version: '2.1', capabilities: ['logs', 'metrics'] },
    });

    expect(entry.severity).toBe('success');
    expect(entry.lines).toEqual([
      '🎉 [10:30:45] Connected to Mgmt v2.1',
      '   📋 Capabilities: logs, metrics',
      '-'.repeat(60),
    ]);
  });
});

describe('classifyLogEntry', () => {
  it('lets the error flag win over the level', () => {
    expect(classifyLogEntry(true, 'INFO')).toBe('error');
    expect(classifyLogEntry(true, 'WARNING')).toBe('error');
  });

  it('classifies by level otherwise', () => {
    expect(classifyLogEntry(false, 'ERROR')).toBe('error');
    expect(classifyLogEntry(false, 'WARNING')).toBe('warning');
    expect(classifyLogEntry(false, 'INFO')).toBe('info');
    expect(classifyLogEntry(false, 'WARN')).toBe('info');
    expect(classifyLogEntry(false, 'UNKNOWN')).toBe('info');
  });
});

describe('handleLogEntry', () => {
  it('renders a warning and counts it', () => {
    const ctx = createContext();
    const entry = handleLogEntry(
      { ...envelope, type: 'log_entry', payload: { level: 'WARNING', message: 'Disk low', isError: false } },
      ctx,
    );

    expect(entry.severity).toBe('warning');
    expect(entry.lines).toEqual(['⚠️ [10:30:45] [WARNING] Disk low']);
    expect(ctx.store.getCounters()).toEqual({ total: 0, errors: 0, warnings: 1, info: 0 });
  });

  it('renders flagged entries as errors', () => {
    const ctx = createContext();
    const entry = handleLogEntry(
      { ...envelope, type: 'log_entry', payload: { level: 'INFO', message: 'boom', isError: true } },
      ctx,
    );

    expect(entry.lines).toEqual(['❌ [10:30:45] [INFO] boom']);
    expect(ctx.store.getCounters().errors).toBe(1);
  });

  it('renders info entries', () => {
    const ctx = createContext();
    const entry = handleLogEntry(
      { ...envelope, type: 'log_entry', payload: { level: 'INFO', message: 'ready', isError: false } },
      ctx,
    );

    expect(entry.lines).toEqual(['ℹ️ [10:30:45] [INFO] ready']);
    expect(ctx.store.getCounters().info).toBe(1);
  });
});

describe('handlePerformanceMetrics', () => {
  it('records a sample and renders both lines', () => {
    const ctx = createContext();
    const entry = handlePerformanceMetrics(
      {
        ...envelope,
        type: 'performance_metrics',
        payload: {
          cpu: 55.2,
          memory: 70,
          disk: 12.34,
          gpu: 0,
          networkStatus: 'Connected',
          webInterfaceAccessible: true,
          apiEndpointAccessible: false,
        },
      },
      ctx,
    );

    expect(entry.lines).toEqual([
      '📊 [10:30:45] CPU: 55.2% | Memory: 70.0% | Disk: 12.3% | GPU: 0.0%',
      '   🌐 Network: Connected | Web: 🟢 | API: 🔴',
    ]);
    expect(ctx.store.latestSample()).toEqual({
      capturedAt: 1_700_000_000_000,
      cpu: 55.2,
      memory: 70,
      disk: 12.34,
      gpu: 0,
    });
  });
});

describe('describeServiceStatus', () => {
  it('prefers installing over every other flag', () => {
    expect(describeServiceStatus(servicePayload({ isInstalling: true, isInstalled: true, isRunning: true })))
      .toBe('🔄 Installing');
    expect(describeServiceStatus(servicePayload({ isInstalling: true, installationProgress: '40%' })))
      .toBe('🔄 Installing - 40%');
  });

  it('prefers uninstalling over installed', () => {
    expect(describeServiceStatus(servicePayload({ isUninstalling: true, isInstalled: true })))
      .toBe('🔄 Uninstalling');
  });

  it('reports installed services as running or stopped', () => {
    expect(describeServiceStatus(servicePayload({ isInstalled: true, isRunning: true }))).toBe('🟢 Running');
    expect(describeServiceStatus(servicePayload({ isInstalled: true }))).toBe('🔴 Stopped');
  });

  it('reports not installed last', () => {
    expect(describeServiceStatus(servicePayload({ isRunning: true }))).toBe('⚪ Not Installed');
  });
});

describe('handleServiceStatus', () => {
  it('adds the error line when the service reports one', () => {
    const entry = handleServiceStatus({
      ...envelope,
      type: 'service_status',
      payload: servicePayload({ isInstalled: true, lastError: 'exit code 1' }),
    });

    expect(entry.severity).toBe('error');
    expect(entry.lines).toEqual(['🔧 [10:30:45] Service: 🔴 Stopped', '   ❌ Error: exit code 1']);
  });
});

describe('handleNetworkDiscovery', () => {
  function discovery(payload: Partial<NetworkDiscoveryMessage['payload']>): NetworkDiscoveryMessage {
    return {
      ...envelope,
      type: 'network_discovery',
      payload: { isDiscovering: false, discoveredNodesCount: 0, lastError: '', nodes: [], ...payload },
    };
  }

  it('lists only the three most recent nodes', () => {
    const nodes = ['a', 'b', 'c', 'd', 'e'].map((name, i) => ({
      name: `node-${name}`,
      address: `10.0.0.${i + 1}`,
      isOnline: i % 2 === 0,
    }));

    const entry = handleNetworkDiscovery(discovery({ isDiscovering: true, discoveredNodesCount: 5, nodes }));

    expect(entry.lines).toEqual([
      '🌐 [10:30:45] Network Discovery: 🔍 Scanning | Nodes: 5',
      '   🟢 node-c (10.0.0.3)',
      '   🔴 node-d (10.0.0.4)',
      '   🟢 node-e (10.0.0.5)',
    ]);
  });

  it('shows the error before the nodes', () => {
    const entry = handleNetworkDiscovery(
      discovery({ lastError: 'timeout', nodes: [{ name: 'n1', address: 'host', isOnline: false }] }),
    );

    expect(entry.severity).toBe('error');
    expect(entry.lines).toEqual([
      '🌐 [10:30:45] Network Discovery: 💤 Idle | Nodes: 0',
      '   ❌ Error: timeout',
      '   🔴 n1 (host)',
    ]);
  });
});

describe('handleDebugMessage', () => {
  it('uses the envelope source', () => {
    const entry = handleDebugMessage({
      ...envelope,
      type: 'debug_message',
      payload: { level: 'DEBUG', message: 'tick', component: 'Scanner' },
    });
    expect(entry.lines).toEqual(['🔍 [10:30:45] [Agent] tick']);
  });

  it('falls back to the component when the source is unknown', () => {
    const entry = handleDebugMessage({
      ...envelope,
      source: 'unknown',
      type: 'debug_message',
      payload: { level: 'ERROR', message: 'failed', component: 'Scanner' },
    });
    expect(entry.severity).toBe('error');
    expect(entry.lines).toEqual(['❌ [10:30:45] [Scanner] failed']);
  });

  it('marks warnings', () => {
    const entry = handleDebugMessage({
      ...envelope,
      type: 'debug_message',
      payload: { level: 'WARNING', message: 'slow', component: null },
    });
    expect(entry.lines).toEqual(['⚠️ [10:30:45] [Agent] slow']);
  });
});

describe('handleUnknown', () => {
  it('names the raw type', () => {
    const entry = handleUnknown({ ...envelope, type: 'unknown', rawType: 'firmware_update', payload: {} });
    expect(entry.severity).toBe('warning');
    expect(entry.lines).toEqual(['📨 [10:30:45] Unknown message type: firmware_update']);
  });
});
