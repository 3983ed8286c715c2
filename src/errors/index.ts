export {
  DiffpressError,
  PreconditionError,
  TimeoutError,
  ContentStoreError,
  RenderError,
  errorMessage,
} from "./diffpress-error";
