/**
 * EGraph — congruence closure over expression terms.
 *
 * Terms are hash-consed into nodes; equalities merge classes and congruent
 * applications follow. Boolean atoms are terms merged with the TRUE or FALSE
 * constant, so a contradiction is either two distinct literals in one class
 * or a recorded disequality whose sides became equal. Quantified subterms are
 * opaque leaves keyed by their alpha-canonical form.
 */

import { boolValue, compareValues, intValue, valueKey } from '../model/values.js';
import { canonicalKey } from '../lang/transform.js';
import type { Expr } from '../lang/ast.js';
import type { Value } from '../model/types.js';

interface ENode {
  op: string;
  args: number[];
}

interface OrderFact {
  op: 'lt' | 'le';
  left: number;
  right: number;
  holds: boolean;
}

export class EGraph {
  private nodes: ENode[] = [];
  private parent: number[] = [];
  private uses: number[][] = [];
  private literal: Array<Value | undefined> = [];
  private signatures = new Map<string, number>();
  private diseqs: Array<[number, number]> = [];
  private order: OrderFact[] = [];
  private pending: Array<[number, number]> = [];
  private inconsistent = false;

  readonly trueId: number;
  readonly falseId: number;

  constructor() {
    this.trueId = this.constant(boolValue(true));
    this.falseId = this.constant(boolValue(false));
  }

  /** True once the asserted facts are contradictory. */
  get conflict(): boolean {
    return this.inconsistent;
  }

  find(id: number): number {
    let root = id;
    while (this.parent[root] !== root) root = this.parent[root];
    let cur = id;
    while (this.parent[cur] !== root) {
      const next = this.parent[cur];
      this.parent[cur] = root;
      cur = next;
    }
    return root;
  }

  // ---------------------------------------------------------------------------
  // Terms
  // ---------------------------------------------------------------------------

  /** Intern `e` and return its node id. */
  add(e: Expr): number {
    switch (e.kind) {
      case 'lit':
        return this.constant(e.value);
      case 'var':
        return this.node(`var:${e.name}`, []);
      case 'state':
        return this.node(`state:${e.name}`, []);
      case 'field':
        return this.node(`.${e.field}`, [this.add(e.target)]);
      case 'val':
        return this.node('.val', [this.add(e.target)]);
      case 'record': {
        const names = Object.keys(e.fields).sort();
        return this.node(`${e.type}{${names.join(',')}}`, names.map((n) => this.add(e.fields[n])));
      }
      case 'unary': {
        const id = this.node(e.op, [this.add(e.operand)]);
        if (e.op === 'neg') this.settle(id);
        return id;
      }
      case 'binary': {
        const left = this.add(e.left);
        const right = this.add(e.right);
        const args = e.op === 'eq' || e.op === 'ne' ? [left, right].sort((a, b) => a - b) : [left, right];
        const id = this.node(e.op, args);
        if (e.op === 'add' || e.op === 'sub' || e.op === 'mul') this.settle(id);
        return id;
      }
      case 'cond':
        return this.node('if', [this.add(e.test), this.add(e.then), this.add(e.else)]);
      case 'bag':
        return this.node('bag', e.elements.map((el) => this.add(el)));
      case 'in':
        return this.node('in', [this.add(e.element), this.add(e.bag)]);
      case 'count':
        return this.node('count', [this.add(e.bag)]);
      case 'quant':
        return this.node(`quant:${canonicalKey(e)}`, []);
    }
  }

  // ---------------------------------------------------------------------------
  // Facts
  // ---------------------------------------------------------------------------

  merge(a: number, b: number): void {
    this.pending.push([a, b]);
    this.propagate();
  }

  distinguish(a: number, b: number): void {
    this.diseqs.push([a, b]);
    if (this.find(a) === this.find(b)) this.inconsistent = true;
  }

  /** Assert a boolean atom (or its negation). */
  assert(e: Expr, positive: boolean): void {
    if (e.kind === 'binary' && e.op === 'eq') {
      const left = this.add(e.left);
      const right = this.add(e.right);
      if (positive) this.merge(left, right);
      else this.distinguish(left, right);
    }
    if (e.kind === 'binary' && (e.op === 'lt' || e.op === 'le')) {
      this.order.push({ op: e.op, left: this.add(e.left), right: this.add(e.right), holds: positive });
    }
    this.merge(this.add(e), positive ? this.trueId : this.falseId);
    this.checkOrder();
  }

  /** Whether the current facts force the atom to `positive`. */
  entails(e: Expr, positive: boolean): boolean {
    if (e.kind === 'binary' && e.op === 'eq') {
      const left = this.find(this.add(e.left));
      const right = this.find(this.add(e.right));
      if (positive && left === right) return true;
      if (!positive && this.distinct(left, right)) return true;
    }
    if (e.kind === 'binary' && (e.op === 'lt' || e.op === 'le')) {
      const decided = this.decideOrder(e.op, this.add(e.left), this.add(e.right));
      if (decided !== undefined) return decided === positive;
    }
    return this.find(this.add(e)) === this.find(positive ? this.trueId : this.falseId);
  }

  clone(): EGraph {
    const copy = new EGraph();
    copy.nodes = this.nodes.map((n) => ({ op: n.op, args: [...n.args] }));
    copy.parent = [...this.parent];
    copy.uses = this.uses.map((u) => [...u]);
    copy.literal = [...this.literal];
    copy.signatures = new Map(this.signatures);
    copy.diseqs = [...this.diseqs];
    copy.order = [...this.order];
    copy.inconsistent = this.inconsistent;
    return copy;
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private constant(v: Value): number {
    const id = this.node(`lit:${valueKey(v)}`, []);
    this.literal[id] = v;
    return id;
  }

  private signature(op: string, args: readonly number[]): string {
    return `${op}(${args.map((a) => this.find(a)).join(',')})`;
  }

  private node(op: string, args: number[]): number {
    const sig = this.signature(op, args);
    const existing = this.signatures.get(sig);
    if (existing !== undefined) return existing;
    const id = this.nodes.length;
    this.nodes.push({ op, args });
    this.parent.push(id);
    this.uses.push([]);
    this.literal.push(undefined);
    for (const a of args) this.uses[this.find(a)].push(id);
    this.signatures.set(sig, id);
    return id;
  }

  private propagate(): void {
    while (this.pending.length > 0) {
      const next = this.pending.pop();
      if (!next) break;
      let ra = this.find(next[0]);
      let rb = this.find(next[1]);
      if (ra === rb) continue;
      if (this.uses[ra].length < this.uses[rb].length) [ra, rb] = [rb, ra];

      const la = this.literal[ra];
      const lb = this.literal[rb];
      if (la && lb && valueKey(la) !== valueKey(lb)) this.inconsistent = true;

      this.parent[rb] = ra;
      this.literal[ra] = la ?? lb;
      for (const user of this.uses[rb]) {
        const n = this.nodes[user];
        const sig = this.signature(n.op, n.args);
        const other = this.signatures.get(sig);
        if (other !== undefined && this.find(other) !== this.find(user)) this.pending.push([user, other]);
        else this.signatures.set(sig, user);
        this.uses[ra].push(user);
      }
      this.uses[rb] = [];
      this.refold(ra);
    }
    for (const [a, b] of this.diseqs) {
      if (this.find(a) === this.find(b)) this.inconsistent = true;
    }
  }

  private distinct(ra: number, rb: number): boolean {
    if (ra === rb) return false;
    const la = this.literal[ra];
    const lb = this.literal[rb];
    if (la && lb) return valueKey(la) !== valueKey(lb);
    return this.diseqs.some(([a, b]) => {
      const fa = this.find(a);
      const fb = this.find(b);
      return (fa === ra && fb === rb) || (fa === rb && fb === ra);
    });
  }

  private settle(id: number): void {
    this.fold(id);
    this.propagate();
  }

  /** Fold an arithmetic node whose arguments are known integers. */
  private fold(id: number): void {
    const n = this.nodes[id];
    const values = n.args.map((a) => this.literal[this.find(a)]);
    const ints: bigint[] = [];
    for (const v of values) {
      if (!v || v.kind !== 'int') return;
      ints.push(v.value);
    }
    let result: bigint;
    switch (n.op) {
      case 'neg':
        result = -ints[0];
        break;
      case 'add':
        result = ints[0] + ints[1];
        break;
      case 'sub':
        result = ints[0] - ints[1];
        break;
      case 'mul':
        result = ints[0] * ints[1];
        break;
      default:
        return;
    }
    this.pending.push([id, this.constant(intValue(result))]);
  }

  private refold(root: number): void {
    if (!this.literal[root]) return;
    for (const user of this.uses[root]) this.fold(user);
  }

  private decideOrder(op: 'lt' | 'le', left: number, right: number): boolean | undefined {
    const ra = this.find(left);
    const rb = this.find(right);
    if (ra === rb) return op === 'le';
    const la = this.literal[ra];
    const lb = this.literal[rb];
    if (!la || !lb || la.kind !== lb.kind || (la.kind !== 'int' && la.kind !== 'string')) return undefined;
    const c = compareValues(la, lb);
    return op === 'lt' ? c < 0 : c <= 0;
  }

  private checkOrder(): void {
    for (const fact of this.order) {
      const decided = this.decideOrder(fact.op, fact.left, fact.right);
      if (decided !== undefined && decided !== fact.holds) this.inconsistent = true;
    }
  }
}
