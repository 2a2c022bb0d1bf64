export { validateAndClean, validateParagraph } from "./engine";
export type { ParagraphAccumulator } from "./engine";
export { cleanRun, createRemovalRecord, findDisallowed, DISALLOWED_RE } from "./cleaning";
export {
  checkFontAndSize,
  checkForbiddenWords,
  checkLabel,
  isTimestamp,
  EXPECTED_FONT,
  EXPECTED_SIZE_PT,
} from "./rules";
