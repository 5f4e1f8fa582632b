export {
  Cursor,
  EventDataParseError,
  parseEventData,
  parseEventDataOrThrow,
} from "./scanner.js";

export type { EventData, ParseError, ParseFailureReason, ParseResult } from "./scanner.js";

export { formatEventData, renderEventData } from "./render.js";
