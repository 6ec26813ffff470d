import type { Bag } from '../model/bag.js';
import type { Value } from '../model/types.js';

/** Read-only view of the state bags an expression may consult. */
export interface StateView {
  get(name: string): Bag | undefined;
}

/**
 * Evaluation environment: a chain of variable scopes over a state view.
 * Extending never mutates the parent.
 */
export class Environment {
  private constructor(
    public readonly state: StateView,
    private readonly vars: ReadonlyMap<string, Value>,
  ) {}

  static of(state: StateView, bindings: Record<string, Value> | Map<string, Value> = {}): Environment {
    const vars = bindings instanceof Map ? new Map(bindings) : new Map(Object.entries(bindings));
    return new Environment(state, vars);
  }

  lookup(name: string): Value | undefined {
    return this.vars.get(name);
  }

  bind(name: string, value: Value): Environment {
    const vars = new Map(this.vars);
    vars.set(name, value);
    return new Environment(this.state, vars);
  }

  names(): string[] {
    return [...this.vars.keys()];
  }
}

export function mapStateView(bags: ReadonlyMap<string, Bag>): StateView {
  return { get: (name) => bags.get(name) };
}
