/**
 * Lexical environment - a chain of frames mapping names to mutable cells.
 *
 * extend() never touches the receiver: it returns a new Environment whose
 * first frame is fresh and whose tail is the receiver's frame chain. Closures
 * keep the Environment they were created in, so a later extend() elsewhere
 * cannot change what they see, while modify() writes into the shared cell and
 * is seen through every alias of that frame.
 */

import type { SchemeObj } from './value.js';
import { UnboundVariableError } from './errors.js';

interface Cell {
  value: SchemeObj;
}

class Frame {
  readonly cells: Map<string, Cell> = new Map();

  constructor(readonly parent: Frame | null) {}
}

export class Environment {
  private static nextId = 0;
  private readonly id: number;

  private constructor(private frame: Frame | null) {
    this.id = Environment.nextId++;
  }

  /**
   * Environment with no frames
   */
  static empty(): Environment {
    return new Environment(null);
  }

  /**
   * New environment with a single-binding frame in front of this one
   */
  extend(name: string, value: SchemeObj): Environment {
    return this.extendMany([[name, value]]);
  }

  /**
   * New environment with one frame holding all of `bindings`.
   * Names must be distinct; the parser rejects duplicates before we get here.
   */
  extendMany(bindings: ReadonlyArray<readonly [string, SchemeObj]>): Environment {
    const frame = new Frame(this.innermostFrame());
    for (const [name, value] of bindings) {
      frame.cells.set(name, { value });
    }
    const env = new Environment(frame);
    if (process.env.DEBUG_FRAME) {
      console.error(`[Environment] env#${this.id} -> env#${env.id}: ${bindings.map(([name]) => name).join(' ')}`);
    }
    return env;
  }

  /**
   * Value bound to `name`, searching innermost to outermost, or undefined
   */
  find(name: string): SchemeObj | undefined {
    return this.lookupCell(name)?.value;
  }

  has(name: string): boolean {
    return this.lookupCell(name) !== undefined;
  }

  /**
   * Overwrite an existing binding in place.
   * Callers check has() first; an absent name is reported as unbound.
   */
  modify(name: string, value: SchemeObj): void {
    const cell = this.lookupCell(name);
    if (!cell) {
      throw new UnboundVariableError(name);
    }
    cell.value = value;
  }

  /**
   * Bind `name` in the innermost frame, in place.
   *
   * This is what lets top-level definitions accumulate on one shared handle.
   */
  define(name: string, value: SchemeObj): void {
    this.innermostFrame().cells.set(name, { value });
  }

  /**
   * Names bound in the innermost frame (for debugging)
   */
  getBindingNames(): string[] {
    return this.frame ? Array.from(this.frame.cells.keys()) : [];
  }

  /**
   * A frame-less environment gets an empty frame on first use, so children
   * created before its first define still see the bindings added later.
   */
  private innermostFrame(): Frame {
    if (!this.frame) {
      this.frame = new Frame(null);
    }
    return this.frame;
  }

  private lookupCell(name: string): Cell | undefined {
    for (let frame = this.frame; frame; frame = frame.parent) {
      const cell = frame.cells.get(name);
      if (cell) {
        return cell;
      }
    }
    return undefined;
  }
}
