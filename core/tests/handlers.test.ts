/**
 * Handler tests: validation, option resolution, diagnostics and audit lines
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { evaluate, explain, countDiagnostics } from '../src/core/handlers.js';
import { loadConfig, setConfig } from '../src/core/config.js';

describe('handlers', () => {
  beforeEach(() => {
    setConfig(loadConfig({ STACKCALC_AUDIT: '0' }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('evaluate', () => {
    it('returns the formatted value and no diagnostics', async () => {
      const out = await evaluate({ expr: '( 3 + 4 ) * 2' });
      expect(out.value).toBe('14');
      expect(out.diagnostics).toEqual([]);
      expect(out.steps).toBeUndefined();
      expect(out.perf.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('turns evaluation failures into diagnostics', async () => {
      const out = await evaluate({ expr: '10 / 0' });
      expect(out.value).toBeNull();
      expect(out.diagnostics).toEqual([
        { code: 'DIVISION_BY_ZERO', message: 'division by zero at position 3', pos: 3, severity: 'error' },
      ]);
    });

    it('omits the position when the failure has none', async () => {
      const out = await evaluate({ expr: '3 4' });
      expect(out.diagnostics).toEqual([
        { code: 'TRAILING_GARBAGE', message: '2 values left on the operand stack', severity: 'error' },
      ]);
    });

    it('reports schema errors instead of throwing', async () => {
      const out = await evaluate({ expr: 42 });
      expect(out.value).toBeNull();
      expect(out.diagnostics).toHaveLength(1);
      expect(out.diagnostics[0].code).toBe('schema_error');
      expect(out.diagnostics[0].message).toMatch(/^expr: /);
    });

    it('rejects out-of-range options', async () => {
      const out = await evaluate({ expr: '1 / 3', options: { precision: 0 } });
      expect(out.diagnostics[0].code).toBe('schema_error');
      expect(out.diagnostics[0].message).toMatch(/^options\.precision: /);
    });

    it('applies request options over the configured defaults', async () => {
      setConfig(loadConfig({ STACKCALC_AUDIT: '0', STACKCALC_PRECISION: '3', STACKCALC_LEXER: 'boundary' }));
      expect((await evaluate({ expr: '2/3' })).value).toBe('0.667');
      expect((await evaluate({ expr: '2/3', options: { precision: 6 } })).value).toBe('0.666667');
      expect((await evaluate({ expr: '2/3', options: { lexer: 'whitespace' } })).diagnostics[0].code).toBe(
        'LEX_ERROR',
      );
    });
  });

  describe('explain', () => {
    it('includes the trace', async () => {
      const out = await explain({ expr: '1 + 2' });
      expect(out.value).toBe('3');
      expect(out.steps).toEqual([
        { kind: 'shift', token: '1', pos: 0, operands: ['1'], operators: [] },
        { kind: 'shift', token: '+', pos: 2, operands: ['1'], operators: ['+'] },
        { kind: 'shift', token: '2', pos: 4, operands: ['1', '2'], operators: ['+'] },
        { kind: 'reduce', op: '+', pos: 2, left: '1', right: '2', result: '3', operands: ['3'], operators: [] },
      ]);
    });

    it('includes the partial trace on failure', async () => {
      const out = await explain({ expr: '1 +' });
      expect(out.value).toBeNull();
      expect(out.diagnostics[0].code).toBe('STACK_UNDERFLOW');
      expect(out.steps).toHaveLength(2);
    });
  });

  describe('audit', () => {
    it('writes one line per call when enabled', async () => {
      setConfig(loadConfig({}));
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

      await evaluate({ expr: '1 / 0' }, { reqId: 'req-1' });

      expect(spy).toHaveBeenCalledTimes(1);
      const line = String(spy.mock.calls[0][0]);
      expect(line.startsWith('[AUDIT] ')).toBe(true);
      const entry = JSON.parse(line.slice('[AUDIT] '.length));
      expect(entry).toMatchObject({
        reqId: 'req-1',
        tool: 'evaluate',
        diagCounts: { error: 1, warning: 0, info: 0 },
      });
      expect(typeof entry.ts).toBe('string');
    });

    it('stays quiet when disabled', async () => {
      const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
      await evaluate({ expr: '1 + 1' });
      expect(spy).not.toHaveBeenCalled();
    });
  });

  it('counts diagnostics by severity', () => {
    expect(
      countDiagnostics([
        { code: 'LEX_ERROR', message: 'a', severity: 'error' },
        { code: 'internal', message: 'b', severity: 'warning' },
        { code: 'internal', message: 'c', severity: 'error' },
      ]),
    ).toEqual({ error: 2, warning: 1, info: 0 });
  });
});
