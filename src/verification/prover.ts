/**
 * Prover — refutation over the quantified bag fragment.
 *
 * Goals are decomposed (conjunctions split, universals skolemized); what is
 * left is negated and added to the hypotheses, and the prover looks for a
 * contradiction:
 *
 * - atoms go into the e-graph;
 * - existential hypotheses are skolemized with fresh constants;
 * - universal hypotheses are instantiated with every term known to be a
 *   member of their generator's bag, for a bounded number of rounds;
 * - disjunctions are simplified against the e-graph and, failing that,
 *   split into cases up to a bounded depth.
 *
 * `prove` answering false means "not shown", never "false".
 */

import { member, ref } from '../lang/builders.js';
import { freshName, substitute, substituteQuals } from '../lang/transform.js';
import type { Expr } from '../lang/ast.js';
import { EGraph } from './egraph.js';
import { atom, forall, negate, substituteFormula, toNnf } from './normalize.js';
import type { Formula } from './normalize.js';

export interface ProverOptions {
  instantiationRounds: number;
  caseSplitDepth: number;
}

type Universal = Extract<Formula, { kind: 'forall' }>;
type Disjunction = Extract<Formula, { kind: 'or' }>;

interface MembershipFact {
  term: Expr;
  termId: number;
  bagId: number;
}

/** Mutable search state of one refutation branch. */
class Branch {
  universals: Universal[] = [];
  disjunctions: Disjunction[] = [];
  facts: MembershipFact[] = [];
  instantiated = new Set<string>();

  constructor(public readonly graph: EGraph = new EGraph()) {}

  fork(): Branch {
    const copy = new Branch(this.graph.clone());
    copy.universals = [...this.universals];
    copy.disjunctions = [...this.disjunctions];
    copy.facts = [...this.facts];
    copy.instantiated = new Set(this.instantiated);
    return copy;
  }
}

/** Bind each generator of `quals` to a fresh constant. */
function skolemize(f: Extract<Formula, { kind: 'forall' | 'exists' }>): Formula[] {
  const sub = new Map<string, Expr>();
  const out: Formula[] = [];
  for (const q of f.quals) {
    if (q.kind === 'gen') {
      const c = ref(freshName(q.name));
      out.push(atom(member(c, substitute(q.source, sub))));
      sub.set(q.name, c);
    } else {
      out.push(toNnf(substitute(q.cond, sub), true));
    }
  }
  out.push(substituteFormula(f.body, sub));
  return out;
}

export class Prover {
  constructor(private readonly options: ProverOptions) {}

  /** Whether `hypotheses` entail `goal`. */
  prove(hypotheses: readonly Formula[], goal: Formula): boolean {
    switch (goal.kind) {
      case 'const':
        return goal.value || this.refute(hypotheses);
      case 'and':
        return goal.parts.every((part) => this.prove(hypotheses, part));
      case 'forall': {
        const parts = skolemize(goal);
        const body = parts.pop();
        if (!body) return true;
        return this.prove([...hypotheses, ...parts], body);
      }
      default:
        return this.refute([...hypotheses, negate(goal)]);
    }
  }

  /** Whether the formulas are jointly unsatisfiable. */
  refute(formulas: readonly Formula[]): boolean {
    return this.saturate(new Branch(), [...formulas], 0);
  }

  // ---------------------------------------------------------------------------
  // Private helpers
  // ---------------------------------------------------------------------------

  private saturate(branch: Branch, queue: Formula[], depth: number): boolean {
    if (this.assertAll(branch, queue)) return true;

    let rounds = 0;
    for (;;) {
      const units: Formula[] = [];
      const open: Disjunction[] = [];
      for (const d of branch.disjunctions) {
        const live = this.liveParts(branch.graph, d);
        if (live === 'satisfied') continue;
        if (live.length === 0) return true;
        if (live.length === 1) units.push(live[0]);
        else open.push({ kind: 'or', parts: live });
      }
      branch.disjunctions = open;
      if (units.length > 0) {
        if (this.assertAll(branch, units)) return true;
        continue;
      }
      if (rounds >= this.options.instantiationRounds) break;
      rounds += 1;
      const instances = this.instantiate(branch);
      if (instances.length === 0) break;
      if (this.assertAll(branch, instances)) return true;
    }

    if (depth >= this.options.caseSplitDepth || branch.disjunctions.length === 0) return false;
    const [split, ...rest] = branch.disjunctions;
    return split.parts.every((part) => {
      const child = branch.fork();
      child.disjunctions = rest;
      return this.saturate(child, [part], depth + 1);
    });
  }

  /** Add formulas to the branch; returns true on contradiction. */
  private assertAll(branch: Branch, formulas: Formula[]): boolean {
    const work = [...formulas];
    while (work.length > 0) {
      const f = work.pop();
      if (!f) break;
      switch (f.kind) {
        case 'const':
          if (!f.value) return true;
          break;
        case 'atom': {
          branch.graph.assert(f.expr, f.positive);
          if (f.positive && f.expr.kind === 'in') {
            branch.facts.push({
              term: f.expr.element,
              termId: branch.graph.add(f.expr.element),
              bagId: branch.graph.add(f.expr.bag),
            });
          }
          break;
        }
        case 'and':
          work.push(...f.parts);
          break;
        case 'or': {
          const live = this.liveParts(branch.graph, f);
          if (live === 'satisfied') break;
          if (live.length === 0) return true;
          if (live.length === 1) work.push(live[0]);
          else branch.disjunctions.push({ kind: 'or', parts: live });
          break;
        }
        case 'exists':
          work.push(...skolemize(f));
          break;
        case 'forall':
          branch.universals.push(f);
          break;
      }
      if (branch.graph.conflict) return true;
    }
    return branch.graph.conflict;
  }

  /** Drop disjuncts the e-graph refutes; 'satisfied' if one is entailed. */
  private liveParts(graph: EGraph, d: Disjunction): Formula[] | 'satisfied' {
    const live: Formula[] = [];
    for (const part of d.parts) {
      if (part.kind === 'atom') {
        if (graph.entails(part.expr, part.positive)) return 'satisfied';
        if (graph.entails(part.expr, !part.positive)) continue;
      }
      if (part.kind === 'const') {
        if (part.value) return 'satisfied';
        continue;
      }
      live.push(part);
    }
    return live;
  }

  /** One round of instantiating universals with known bag members. */
  private instantiate(branch: Branch): Formula[] {
    const out: Formula[] = [];
    const universals = [...branch.universals];
    const facts = [...branch.facts];
    universals.forEach((u, index) => {
      const first = u.quals[0];
      if (first.kind !== 'gen') return;
      const bag = branch.graph.find(branch.graph.add(first.source));
      for (const fact of facts) {
        if (branch.graph.find(fact.bagId) !== bag) continue;
        const key = `${index}:${branch.graph.find(fact.termId)}`;
        if (branch.instantiated.has(key)) continue;
        branch.instantiated.add(key);
        const [quals, inner] = substituteQuals(u.quals.slice(1), new Map([[first.name, fact.term]]));
        out.push(forall(quals, substituteFormula(u.body, inner)));
      }
    });
    return out;
  }
}
