export {
  KernelNamingFrom,
  KernelNamingLive,
  ArtifactWriterFrom,
} from "./layers.js";

export {
  prettyLogger,
  loggerLayer,
  withSpan,
  parseLogLevel,
} from "./logging.js";
