import { ValidationError } from "../errors";

export function safeParseJson(text: string): unknown {
  if (typeof text !== "string") {
    throw new ValidationError("JSON input must be a string");
  }
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    throw new ValidationError("Invalid JSON input");
  }
}
