/**
 * Function registry for /function commands.
 * Ships three demonstration functions with fixed results; register() adds real handlers
 * without touching the router. Unknown names echo their parameters instead of failing.
 */

export type FunctionParameters = Record<string, unknown>;

export interface FunctionResult {
  /** One-line description, fed back to the model. */
  result: string;
  data: unknown;
}

export type FunctionHandler = (parameters: FunctionParameters) => FunctionResult | Promise<FunctionResult>;

export class FunctionRegistry {
  private readonly handlers = new Map<string, FunctionHandler>();

  register(name: string, handler: FunctionHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }

  /** Registered names in registration order. */
  names(): string[] {
    return [...this.handlers.keys()];
  }

  async invoke(name: string, parameters: FunctionParameters): Promise<FunctionResult> {
    const handler = this.handlers.get(name);
    if (!handler) {
      return { result: `Function ${name} executed`, data: parameters };
    }
    return handler(parameters);
  }
}

export function createDefaultFunctions(): FunctionRegistry {
  return new FunctionRegistry()
    .register("get_weather", () => ({
      result: "The weather is sunny with a temperature of 72°F",
      data: { temperature: 72, condition: "sunny" },
    }))
    .register("get_user_info", () => ({
      result: "User information retrieved successfully",
      data: { name: "Test User", email: "user@example.com" },
    }))
    .register("search_database", () => ({
      result: "Found 5 matching records",
      data: { count: 5, records: ["Record 1", "Record 2", "Record 3"] },
    }));
}
