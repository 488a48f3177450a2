import { expect } from "chai";
import { describe, it } from "mocha";
import { TuringMachine } from "../../lib/evaluator/turingMachine.js";
import { Direction } from "../../lib/machine/direction.js";
import { TransitionTable } from "../../lib/machine/transitionTable.js";
import {
  createRule,
  type MachineConfig,
  type RunState,
} from "../../lib/machine/types.js";

const config: MachineConfig = {
  name: "test",
  initialState: "q0",
  acceptStates: ["qA"],
};

function machine(
  input: string,
  ...rules: Parameters<typeof createRule>[]
): TuringMachine {
  return new TuringMachine(
    config,
    new TransitionTable(rules.map((rule) => createRule(...rule))),
    input,
  );
}

describe("TuringMachine", () => {
  it("starts in the initial state at the first cell", () => {
    const tm = machine("10");
    expect(tm.currentState).to.equal("q0");
    expect(tm.headPosition).to.equal(0);
    expect(tm.tape).to.deep.equal(["1", "0"]);
  });

  it("appends the reject state to its accept states once", () => {
    const tm = machine("");
    expect(tm.acceptStates).to.deep.equal(["qA", "REJECT"]);
    expect(config.acceptStates).to.deep.equal(["qA"]);
    tm.run();
    expect(tm.acceptStates).to.deep.equal(["qA", "REJECT"]);
  });

  describe("step", () => {
    it("writes, moves and changes state inside the tape", () => {
      const tm = machine("ab", ["q0", "a", "q1", "x", Direction.Right]);
      const rule = tm.step();
      expect(rule?.newState).to.equal("q1");
      expect(tm.snapshot()).to.deep.equal({
        currentState: "q1",
        headPosition: 1,
        tape: ["x", "b"],
      });
    });

    it("rejects without touching tape or head when no rule matches", () => {
      const tm = machine("ab", ["q0", "b", "q1", "x", Direction.Right]);
      expect(tm.step()).to.equal(undefined);
      expect(tm.snapshot()).to.deep.equal({
        currentState: "REJECT",
        headPosition: 0,
        tape: ["a", "b"],
      });
    });

    it("reads blank past the right end and appends it", () => {
      const tm = machine("a", ["q0", "a", "q0", "a", Direction.Right], [
        "q0",
        "_",
        "q1",
        "x",
        Direction.Right,
      ]);
      tm.step();
      expect(tm.headPosition).to.equal(1);
      expect(tm.tape).to.deep.equal(["a"]);
      tm.step();
      expect(tm.tape).to.deep.equal(["a", "_"]);
      expect(tm.headPosition).to.equal(2);
      expect(tm.currentState).to.equal("q1");
    });

    it("reads blank before the left end and prepends it", () => {
      const tm = machine("a", ["q0", "a", "q0", "a", Direction.Left], [
        "q0",
        "_",
        "q1",
        "x",
        Direction.Halt,
      ]);
      tm.step();
      expect(tm.headPosition).to.equal(-1);
      tm.step();
      expect(tm.tape).to.deep.equal(["_", "a"]);
      expect(tm.headPosition).to.equal(-1);
      expect(tm.currentState).to.equal("q1");
    });

    it("moves right from -1 onto the prepended cell", () => {
      const tm = machine(
        "1",
        ["q0", "1", "q1", "1", Direction.Left],
        ["q1", "_", "q2", "x", Direction.Right],
        ["q2", "_", "qA", "_", Direction.Halt],
        ["q2", "1", "qB", "1", Direction.Halt],
      );
      const outcome = tm.run();
      expect(outcome.state).to.equal("qA");
      expect(tm.tape).to.deep.equal(["_", "1"]);
      expect(tm.headPosition).to.equal(0);
    });

    it("keeps the head on the tape when it keeps moving left", () => {
      const tm = machine("", ["q0", "_", "q0", "_", Direction.Left]);
      tm.step();
      expect(tm.tape).to.deep.equal(["_"]);
      expect(tm.headPosition).to.equal(-1);
      tm.step();
      expect(tm.tape).to.deep.equal(["_", "_"]);
      expect(tm.headPosition).to.equal(-1);
    });

    it("never changes the tape length for in-bounds steps", () => {
      const tm = machine("abc", ["q0", "a", "q0", "x", Direction.Right], [
        "q0",
        "b",
        "q0",
        "y",
        Direction.Right,
      ], ["q0", "c", "q0", "z", Direction.Left]);
      for (let i = 0; i < 3; i++) {
        tm.step();
        expect(tm.tape.length).to.equal(3);
      }
      expect(tm.tape).to.deep.equal(["x", "y", "z"]);
      expect(tm.headPosition).to.equal(1);
    });
  });

  describe("run", () => {
    it("runs the end-to-end scenario", () => {
      const tm = machine("1", ["q0", "1", "q0", "1", Direction.Right], [
        "q0",
        "_",
        "qA",
        "_",
        Direction.Halt,
      ]);
      const outcome = tm.run();
      expect(outcome).to.deep.equal({
        state: "qA",
        steps: 2,
        halted: true,
        accepted: true,
      });
      expect(tm.tape).to.deep.equal(["1", "_"]);
      expect(tm.headPosition + 1).to.equal(2);
    });

    it("takes at least one step even from an accept state", () => {
      const tm = new TuringMachine(
        { name: "t", initialState: "qA", acceptStates: ["qA"] },
        new TransitionTable([
          createRule("qA", "1", "qB", "0", Direction.Right),
          createRule("qB", "_", "qA", "_", Direction.Halt),
        ]),
        "1",
      );
      const outcome = tm.run();
      expect(outcome.steps).to.equal(2);
      expect(tm.tape).to.deep.equal(["0", "_"]);
    });

    it("stops at the first terminal state it observes", () => {
      const seen: string[] = [];
      const tm = machine(
        "11",
        ["q0", "1", "qA", "1", Direction.Right],
        ["qA", "1", "q0", "1", Direction.Right],
      );
      const outcome = tm.run({
        onStep: (state: RunState) => seen.push(state.currentState),
      });
      expect(seen).to.deep.equal(["qA"]);
      expect(outcome.steps).to.equal(1);
      expect(tm.headPosition).to.equal(1);
    });

    it("ends in REJECT when no rule applies", () => {
      const tm = machine("10", ["q0", "1", "q0", "1", Direction.Right]);
      expect(tm.run()).to.deep.equal({
        state: "REJECT",
        steps: 2,
        halted: true,
        accepted: false,
      });
      expect(tm.headPosition).to.equal(1);
    });

    it("honours a step limit", () => {
      const tm = machine("", ["q0", "_", "q0", "_", Direction.Right]);
      const outcome = tm.run({ maxSteps: 5 });
      expect(outcome).to.deep.equal({
        state: "q0",
        steps: 5,
        halted: false,
        accepted: false,
      });
      expect(tm.tape).to.deep.equal(["_", "_", "_", "_", "_"]);
      expect(tm.headPosition).to.equal(5);
    });

    it("passes the applied rule to the observer", () => {
      const rules: (string | undefined)[] = [];
      const tm = machine("1", ["q0", "1", "q1", "1", Direction.Halt]);
      tm.run({ onStep: (_state, rule) => rules.push(rule?.newState) });
      expect(rules).to.deep.equal(["q1", undefined]);
      expect(tm.currentState).to.equal("REJECT");
    });
  });
});
