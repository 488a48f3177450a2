/**
 * Single-tape Turing machine execution engine.
 *
 * @module
 */
import type { Evaluator, RunOptions, RunOutcome } from "./evaluator.js";
import { Tape } from "./tape.js";
import { headOffset } from "../machine/direction.js";
import type { TransitionTable } from "../machine/transitionTable.js";
import {
  BLANK,
  type MachineConfig,
  REJECT_STATE,
  type RunState,
  type TransitionRule,
} from "../machine/types.js";

export class TuringMachine implements Evaluator {
  readonly name: string;
  readonly initialState: string;
  private readonly accepting: readonly string[];
  private readonly terminal: ReadonlySet<string>;
  private readonly tapeCells: Tape;
  private state: string;
  private head = 0;

  constructor(
    config: MachineConfig,
    private readonly transitions: TransitionTable,
    input: string,
  ) {
    this.name = config.name;
    this.initialState = config.initialState;
    this.accepting = [...config.acceptStates, REJECT_STATE];
    this.terminal = new Set(this.accepting);
    this.tapeCells = new Tape(input);
    this.state = config.initialState;
  }

  get currentState(): string {
    return this.state;
  }

  /** Zero-based; may be -1 or the tape length between steps. */
  get headPosition(): number {
    return this.head;
  }

  get tape(): string[] {
    return this.tapeCells.toArray();
  }

  /** The configured accept states followed by the reject state. */
  get acceptStates(): string[] {
    return [...this.accepting];
  }

  isTerminal(): boolean {
    return this.terminal.has(this.state);
  }

  isAccepted(): boolean {
    return this.state !== REJECT_STATE && this.terminal.has(this.state);
  }

  snapshot(): RunState {
    return {
      currentState: this.state,
      headPosition: this.head,
      tape: this.tape,
    };
  }

  step(): TransitionRule | undefined {
    const read = this.tapeCells.read(this.head) ?? BLANK;
    const rule = this.transitions.lookup(this.state, read);
    if (rule === undefined) {
      this.state = REJECT_STATE;
      return undefined;
    }

    if (this.head === -1) {
      this.tapeCells.prepend(read);
    } else if (this.head === this.tapeCells.length) {
      this.tapeCells.append(read);
    } else {
      this.tapeCells.write(this.head, rule.writeSymbol);
    }

    // Indices are not shifted by a prepend; a Left move from -1 stays at -1
    // so the next step grows the tape again.
    this.head = Math.max(this.head + headOffset(rule.direction), -1);
    this.state = rule.newState;
    return rule;
  }

  run(options: RunOptions = {}): RunOutcome {
    const { maxSteps = Infinity, onStep } = options;
    let steps = 0;
    do {
      if (steps >= maxSteps) {
        return { state: this.state, steps, halted: false, accepted: false };
      }
      const rule = this.step();
      steps++;
      onStep?.(this.snapshot(), rule);
    } while (!this.isTerminal());

    return {
      state: this.state,
      steps,
      halted: true,
      accepted: this.isAccepted(),
    };
  }
}
