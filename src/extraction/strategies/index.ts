import type { ExtractionStrategy } from "../types";
import { directMarkupStrategy } from "./direct-markup";
import { embeddedJsonStrategy } from "./embedded-json";
import { iframeSourceStrategy } from "./iframe-source";
import { inlineScriptStrategy } from "./inline-script";
import { packedScriptStrategy } from "./packed-script";

export const createDefaultStrategies = (): ExtractionStrategy[] => [
  directMarkupStrategy,
  inlineScriptStrategy,
  embeddedJsonStrategy,
  packedScriptStrategy,
  iframeSourceStrategy,
];

export {
  directMarkupStrategy,
  embeddedJsonStrategy,
  iframeSourceStrategy,
  inlineScriptStrategy,
  packedScriptStrategy,
};
