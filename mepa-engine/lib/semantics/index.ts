export {
  applyInstruction,
  floorDiv,
  type ControlEffect,
  type ExecContext,
} from "./apply-instruction";
export { expectIntArg, expectSingleArg, expectValueArg } from "./operands";
