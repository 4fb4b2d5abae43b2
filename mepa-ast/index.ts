export * from "./types/instruction";
export * from "./types/program";
export {
  parseInstruction,
  tokenize,
  isLabelName,
  parseIntegerToken,
  parseValueToken,
} from "./lib/parser";
export { ProgramImage, ProgramError } from "./lib/program-image";
export { parseProgramText, formatProgramText } from "./lib/program-text";
export { buildSnapshot, findStartIndex, resolveTarget } from "./lib/snapshot";
