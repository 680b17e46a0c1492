/**
 * Unit tests for dashboard widgets.
 *
 * These exercise widget state without a screen; full rendering would
 * require a terminal.
 */

import { describe, it, expect } from 'vitest';
import {
  CountersTableWidget,
  FeedLogWidget,
  UsageGaugeWidget,
  buildCounterRows,
  getColorForPercent,
} from '../../src/tui/widgets/index.js';
import { DARK_THEME, LIGHT_THEME } from '../../src/tui/types.js';
import { AggregateStore } from '../../src/state/aggregate-store.js';

describe('FeedLogWidget', () => {
  it('retains every line of each entry', () => {
    const widget = new FeedLogWidget({ theme: DARK_THEME, maxEntries: 10, now: () => 1000 });

    widget.update({ kind: 'welcome', severity: 'success', lines: ['one', 'two'] });
    widget.update({ kind: 'log_entry', severity: 'error', lines: ['three'] });

    expect(widget.getEntries()).toEqual([
      { timestamp: 1000, severity: 'success', text: 'one' },
      { timestamp: 1000, severity: 'success', text: 'two' },
      { timestamp: 1000, severity: 'error', text: 'three' },
    ]);
  });

  it('drops the oldest lines beyond maxEntries', () => {
    const widget = new FeedLogWidget({ theme: LIGHT_THEME, maxEntries: 2 });

    widget.update({ kind: 'session', severity: 'info', lines: ['a', 'b', 'c'] });

    expect(widget.getEntries().map((entry) => entry.text)).toEqual(['b', 'c']);
  });

  it('keeps lines and can be destroyed before it is placed', () => {
    const widget = new FeedLogWidget({ theme: DARK_THEME, maxEntries: 5 });

    widget.update({ kind: 'diagnostic', severity: 'error', lines: ['early'] });

    expect(() => widget.destroy()).not.toThrow();
    expect(widget.getEntries().map((entry) => entry.text)).toEqual(['early']);
  });
});

describe('UsageGaugeWidget', () => {
  it('builds labels with and without a value', () => {
    const widget = new UsageGaugeWidget({ theme: DARK_THEME, title: 'CPU' });

    expect(widget.buildLabel(55.2)).toBe(' CPU (55.2%) ');
    expect(widget.buildLabel(null)).toBe(' CPU (-) ');
  });

  it('ignores updates before create', () => {
    const widget = new UsageGaugeWidget({ theme: DARK_THEME, title: 'Memory' });
    expect(() => widget.update({ percent: 42 })).not.toThrow();
  });
});

describe('getColorForPercent', () => {
  it('uses theme colors by threshold', () => {
    expect(getColorForPercent(DARK_THEME, 0)).toBe('green');
    expect(getColorForPercent(DARK_THEME, 59)).toBe('green');
    expect(getColorForPercent(DARK_THEME, 60)).toBe('yellow');
    expect(getColorForPercent(DARK_THEME, 79)).toBe('yellow');
    expect(getColorForPercent(DARK_THEME, 80)).toBe('red');
    expect(getColorForPercent(DARK_THEME, 100)).toBe('red');
  });
});

describe('CountersTableWidget', () => {
  it('builds rows from a snapshot', () => {
    const store = new AggregateStore();
    store.recordMessage();
    store.recordMessage();
    store.recordSeverity('error');
    store.recordPerformance({ capturedAt: 0, cpu: 55.2, memory: 70, disk: 0, gpu: 0 });

    expect(buildCounterRows(store.snapshot())).toEqual([
      ['Total Messages', '2'],
      ['Errors', '1'],
      ['Warnings', '0'],
      ['Info', '0'],
      ['Samples', '1'],
      ['Average CPU', '55.2%'],
      ['Average Memory', '70.0%'],
    ]);
  });

  it('shows a dash for averages without samples', () => {
    const rows = buildCounterRows(new AggregateStore().snapshot());
    expect(rows.slice(-2)).toEqual([
      ['Average CPU', '-'],
      ['Average Memory', '-'],
    ]);
  });

  it('ignores updates before create', () => {
    const widget = new CountersTableWidget({ theme: DARK_THEME });
    expect(() => widget.update(new AggregateStore().snapshot())).not.toThrow();
  });
});
