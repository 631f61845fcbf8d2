import { isAstNode, type AstNode } from '../ast/node.js';

/**
 * Whether a pattern position matched during a run:
 * `undefined` if it was never entered, otherwise `false`/`true`
 */
export type MatchStatus = boolean | undefined;

/**
 * Record of one run of an instrumented matcher.
 *
 * Create a fresh instance for every run; a trace must not be shared
 * between runs, concurrent or not.
 */
export class Trace {
  private readonly visits = new Map<number, boolean>();
  private readonly governors = new Map<AstNode, number>();

  /**
   * Mark a pattern position as entered but not (yet) matched
   */
  enter(id: number): true {
    this.visits.set(id, false);
    return true;
  }

  /**
   * Mark a pattern position as matched
   */
  success(id: number): true {
    this.visits.set(id, true);
    return true;
  }

  matched(id: number): MatchStatus {
    return this.visits.get(id);
  }

  /**
   * Bind the analyzed node under test to the pattern position governing
   * it. Non-node subjects are ignored; the latest binding wins.
   */
  visit(subject: unknown, governor: number): true {
    if (isAstNode(subject)) {
      this.governors.set(subject, governor);
    }
    return true;
  }

  /**
   * The governing pattern position an analyzed node was tested by
   */
  governorOf(node: AstNode): number | undefined {
    return this.governors.get(node);
  }

  /**
   * Number of positions entered and matched during the run
   */
  summary(): { entered: number; matched: number } {
    let matched = 0;
    for (const status of this.visits.values()) {
      if (status) matched++;
    }
    return { entered: this.visits.size, matched };
  }
}
