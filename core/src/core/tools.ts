import type { FastMCP } from "fastmcp";
import { z } from "zod";
import { evaluate, explain } from "./handlers.js";
import { EvalOptions } from "./schema.js";

const ExprParams = z.object({
  expr: z.string().describe("Infix expression, e.g. \"( 3 + 4 ) * 2\""),
  options: EvalOptions.optional().describe("Lexer, precision and rounding overrides")
});

export interface ExprTool {
  name: string;
  description: string;
  parameters: typeof ExprParams;
  execute: (params: z.infer<typeof ExprParams>) => Promise<string>;
}

/**
 * MCP tools are thin wrappers around core handlers - no business logic here
 */
export const exprTools: ExprTool[] = [
  {
    name: "calc.evaluate",
    description: "Evaluate an infix arithmetic expression (+ - * / and parentheses)",
    parameters: ExprParams,
    execute: async (params) => JSON.stringify(await evaluate(params), null, 2)
  },
  {
    name: "calc.explain",
    description: "Evaluate an expression and return every shift/reduce step of the two stacks",
    parameters: ExprParams,
    execute: async (params) => JSON.stringify(await explain(params), null, 2)
  }
];

/**
 * Register all tools with the MCP server
 *
 * @param server The FastMCP server instance
 */
export function registerTools(server: FastMCP) {
  for (const tool of exprTools) server.addTool(tool);
}
