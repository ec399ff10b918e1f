/**
 * Textual rendering of values.
 *
 * show() is the REPL form (strings quoted and escaped); displayString() is
 * what `display` writes (strings verbatim, everything else as show()).
 */

import type { SchemeObj } from './value.js';

function escapeString(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case '"': out += '\\"'; break;
      case '\\': out += '\\\\'; break;
      case '\n': out += '\\n'; break;
      case '\t': out += '\\t'; break;
      case '\r': out += '\\r'; break;
      default: out += ch; break;
    }
  }
  return out + '"';
}

function render(obj: SchemeObj, quoteStrings: boolean): string {
  const i = obj.asInteger();
  if (i) return String(i.value);

  const r = obj.asRational();
  if (r) return `${r.numerator}/${r.denominator}`;

  const b = obj.asBoolean();
  if (b) return b.value ? '#t' : '#f';

  const s = obj.asString();
  if (s) return quoteStrings ? escapeString(s.value) : s.value;

  const sym = obj.asSymbol();
  if (sym) return sym.name;

  if (obj.asNil()) return '()';

  const pair = obj.asPair();
  if (pair) {
    // Walk the cdr chain; a non-list tail is printed after a dot
    const parts: string[] = [render(pair.car, quoteStrings)];
    let tail = pair.cdr;
    for (let next = tail.asPair(); next; next = tail.asPair()) {
      parts.push(render(next.car, quoteStrings));
      tail = next.cdr;
    }
    if (!tail.asNil()) {
      parts.push('.', render(tail, quoteStrings));
    }
    return `(${parts.join(' ')})`;
  }

  if (obj.asProcedure()) return '#<procedure>';
  if (obj.asVoid()) return '#<void>';
  if (obj.asTerminate()) return '#<terminate>';
  if (obj.asUnassigned()) return '#<unassigned>';

  return '#<unknown>';
}

export function show(obj: SchemeObj): string {
  return render(obj, true);
}

export function displayString(obj: SchemeObj): string {
  return render(obj, false);
}
