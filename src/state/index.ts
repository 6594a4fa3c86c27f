export {
  DEFAULT_CURSOR,
  STATE_FILE_NAME,
  StateError,
  StateService,
  resolveCursor,
} from "./store";
