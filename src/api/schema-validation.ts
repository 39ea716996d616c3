import Ajv, { type ErrorObject } from "ajv";
import { ValidationError } from "../runtime/errors";
import {
  buildExtractRequestSchema,
  type ExtractRequestPayload,
  type ExtractTimeoutPolicy,
} from "./contracts";

export interface ExtractRequestInput {
  url: string;
  requesterId: string | null;
  validateLinks: boolean | null;
  timeoutMs: number;
}

const formatAjvError = (error: ErrorObject): string => {
  const location = error.instancePath || "/";
  if (error.keyword === "required") {
    return `${location} missing required field '${String(error.params.missingProperty ?? "")}'.`;
  }
  if (error.keyword === "additionalProperties") {
    return `${location} has unknown field '${String(error.params.additionalProperty ?? "")}'.`;
  }
  return `${location} ${error.message ?? "is invalid"}.`;
};

const normalizeExtractRequest = (
  payload: ExtractRequestPayload,
  timeoutPolicy: ExtractTimeoutPolicy,
): ExtractRequestInput => {
  const url = payload.url.trim();
  if (!url) {
    throw new ValidationError("`url` must be a non-empty string.");
  }

  return {
    url,
    requesterId: payload.requester_id?.trim() || null,
    validateLinks: typeof payload.validate_links === "boolean" ? payload.validate_links : null,
    timeoutMs: payload.timeout_ms ?? timeoutPolicy.defaultMs,
  };
};

export const createExtractRequestValidator = (timeoutPolicy: ExtractTimeoutPolicy) => {
  const ajv = new Ajv({
    allErrors: true,
    strict: false,
  });
  const validate = ajv.compile<ExtractRequestPayload>(buildExtractRequestSchema(timeoutPolicy));

  return (payload: unknown): ExtractRequestInput => {
    if (!validate(payload)) {
      const issues = (validate.errors ?? []).map(formatAjvError);
      throw new ValidationError("Request payload failed schema validation.", {
        schema: "ExtractRequestV1",
        issues,
      });
    }

    return normalizeExtractRequest(payload, timeoutPolicy);
  };
};
