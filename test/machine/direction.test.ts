import { expect } from "chai";
import { describe, it } from "mocha";
import {
  Direction,
  headOffset,
  parseDirection,
} from "../../lib/machine/direction.js";

describe("Direction", () => {
  it("parses the three tokens", () => {
    expect(parseDirection("<")).to.equal(Direction.Left);
    expect(parseDirection(">")).to.equal(Direction.Right);
    expect(parseDirection("-")).to.equal(Direction.Halt);
  });

  it("returns undefined for anything else", () => {
    expect(parseDirection("R")).to.equal(undefined);
    expect(parseDirection("")).to.equal(undefined);
    expect(parseDirection("<>")).to.equal(undefined);
  });

  it("maps directions to head offsets", () => {
    expect(headOffset(Direction.Left)).to.equal(-1);
    expect(headOffset(Direction.Right)).to.equal(1);
    expect(headOffset(Direction.Halt)).to.equal(0);
  });
});
