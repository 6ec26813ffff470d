import { formatValue } from '../model/values.js';
import type { BinaryOp, Effect, Expr, Qualifier } from './ast.js';

const SYMBOLS: Record<BinaryOp, string> = {
  and: 'and',
  or: 'or',
  implies: '=>',
  eq: '==',
  ne: '!=',
  lt: '<',
  le: '<=',
  gt: '>',
  ge: '>=',
  add: '+',
  sub: '-',
  mul: '*',
  union: '+',
  diff: '-',
};

function atomic(e: Expr): boolean {
  return e.kind !== 'binary' && e.kind !== 'unary' && e.kind !== 'cond' && e.kind !== 'in';
}

function wrap(e: Expr): string {
  return atomic(e) ? printExpr(e) : `(${printExpr(e)})`;
}

function printQualifier(q: Qualifier): string {
  return q.kind === 'gen' ? `${q.name} <- ${printExpr(q.source)}` : printExpr(q.cond);
}

export function printExpr(e: Expr): string {
  switch (e.kind) {
    case 'lit':
      return formatValue(e.value);
    case 'var':
    case 'state':
      return e.name;
    case 'field':
      return `${wrap(e.target)}.${e.field}`;
    case 'val':
      return `${wrap(e.target)}.val`;
    case 'record': {
      const parts = Object.entries(e.fields).map(([k, f]) => `${k}: ${printExpr(f)}`);
      return `${e.type} {${parts.join(', ')}}`;
    }
    case 'unary':
      return e.op === 'not' ? `not ${wrap(e.operand)}` : `-${wrap(e.operand)}`;
    case 'binary':
      return `${wrap(e.left)} ${SYMBOLS[e.op]} ${wrap(e.right)}`;
    case 'cond':
      return `if ${printExpr(e.test)} then ${printExpr(e.then)} else ${printExpr(e.else)}`;
    case 'bag':
      return `[${e.elements.map(printExpr).join(', ')}]`;
    case 'in':
      return `${wrap(e.element)} in ${wrap(e.bag)}`;
    case 'count':
      return `len ${wrap(e.bag)}`;
    case 'quant': {
      const body = `[${printExpr(e.head)} | ${e.quals.map(printQualifier).join(', ')}]`;
      return e.quant === 'comp' ? body : `${e.quant} ${body}`;
    }
  }
}

export function printEffect(effect: Effect, indent = ''): string {
  switch (effect.kind) {
    case 'insert':
      return `${indent}${effect.target}.add(${printExpr(effect.value)});`;
    case 'remove':
      return `${indent}${effect.target}.remove(${printExpr(effect.value)});`;
    case 'when': {
      const lines = [`${indent}if (${printExpr(effect.cond)}) {`];
      for (const s of effect.then) lines.push(printEffect(s, `${indent}  `));
      if (effect.else.length > 0) {
        lines.push(`${indent}} else {`);
        for (const s of effect.else) lines.push(printEffect(s, `${indent}  `));
      }
      lines.push(`${indent}}`);
      return lines.join('\n');
    }
    case 'let': {
      const lines = [`${indent}let ${effect.name} = ${printExpr(effect.value)};`];
      for (const s of effect.body) lines.push(printEffect(s, indent));
      return lines.join('\n');
    }
  }
}
