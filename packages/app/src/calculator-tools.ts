import type { ToolHandler, ToolSchema } from '@gramloop/core';
import type { ToolRegistry } from '@gramloop/tools';

const OPERANDS = {
  type: 'object',
  properties: {
    a: { type: 'number', description: 'Left operand' },
    b: { type: 'number', description: 'Right operand' },
  },
  required: ['a', 'b'],
  additionalProperties: false,
};

function operands(args: Readonly<Record<string, unknown>>): [number, number] {
  const { a, b } = args;
  if (typeof a !== 'number' || typeof b !== 'number') {
    throw new TypeError('Both "a" and "b" must be numbers');
  }
  return [a, b];
}

function binary(name: string, description: string, op: (a: number, b: number) => number): [ToolSchema, ToolHandler] {
  return [
    { name, description, parameters: OPERANDS },
    async (args) => op(...operands(args)),
  ];
}

/** Demo arithmetic tools for the CLI. */
export const CALCULATOR_TOOLS: readonly [ToolSchema, ToolHandler][] = [
  binary('add', 'Add two numbers', (a, b) => a + b),
  binary('subtract', 'Subtract b from a', (a, b) => a - b),
  binary('multiply', 'Multiply two numbers', (a, b) => a * b),
  binary('divide', 'Divide a by b', (a, b) => {
    if (b === 0) throw new RangeError('Division by zero');
    return a / b;
  }),
];

export function registerCalculatorTools(registry: ToolRegistry): ToolRegistry {
  for (const [schema, handler] of CALCULATOR_TOOLS) registry.register(schema, handler);
  return registry;
}
