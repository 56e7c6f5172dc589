import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FastMCP } from 'fastmcp';
import { exprTools, registerTools } from '../src/core/tools.js';
import { loadConfig, setConfig } from '../src/core/config.js';

function tool(name: string) {
  const found = exprTools.find((t) => t.name === name);
  if (!found) throw new Error(`no tool named ${name}`);
  return found;
}

describe('MCP tools', () => {
  beforeEach(() => {
    setConfig(loadConfig({ STACKCALC_AUDIT: '0' }));
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('registers both tools on the server', () => {
    const server = new FastMCP({ name: 'stackcalc-test', version: '0.0.0' });
    const addTool = vi.spyOn(server, 'addTool').mockImplementation(() => {});

    registerTools(server);

    expect(addTool).toHaveBeenCalledTimes(2);
    expect(addTool.mock.calls.map(([t]) => t.name)).toEqual(['calc.evaluate', 'calc.explain']);
  });

  it('shares one parameter schema', () => {
    const [evaluateTool, explainTool] = exprTools;
    expect(evaluateTool.parameters).toBe(explainTool.parameters);
    expect(evaluateTool.parameters.safeParse({ expr: '1 + 1', options: { lexer: 'boundary' } }).success).toBe(true);
    expect(evaluateTool.parameters.safeParse({ expr: 1 }).success).toBe(false);
  });

  it('calc.evaluate returns the handler output as JSON text', async () => {
    const out = JSON.parse(await tool('calc.evaluate').execute({ expr: '( 3 + 4 ) * 2' }));
    expect(out.value).toBe('14');
    expect(out.diagnostics).toEqual([]);
    expect(out.steps).toBeUndefined();
  });

  it('calc.evaluate reports failures as diagnostics', async () => {
    const out = JSON.parse(await tool('calc.evaluate').execute({ expr: '10 / 0' }));
    expect(out.value).toBeNull();
    expect(out.diagnostics).toEqual([
      { code: 'DIVISION_BY_ZERO', message: 'division by zero at position 3', pos: 3, severity: 'error' },
    ]);
  });

  it('calc.explain includes the steps', async () => {
    const out = JSON.parse(await tool('calc.explain').execute({ expr: '2 * 3' }));
    expect(out.value).toBe('6');
    expect(out.steps).toHaveLength(4);
    expect(out.steps[3]).toEqual({
      kind: 'reduce',
      op: '*',
      pos: 2,
      left: '2',
      right: '3',
      result: '6',
      operands: ['6'],
      operators: [],
    });
  });
});
