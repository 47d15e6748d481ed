import { errorMessage, type ErrorCategory } from "../errors.js";

export type ErrorSeverity = "low" | "medium" | "high" | "critical";

export const SEVERITIES: readonly ErrorSeverity[] = ["low", "medium", "high", "critical"];

const AUTH_KEYWORDS = ["authentication", "unauthorized", "api key"];

/**
 * Classify a failure. Deterministic: depends only on the category and the
 * lower-cased error message.
 */
export function determineSeverity(error: unknown, category: ErrorCategory): ErrorSeverity {
  const text = errorMessage(error).toLowerCase();

  if (category === "workflow" && text.includes("task_manager")) return "critical";
  if (category === "configuration" && text.includes("invalid")) return "critical";

  if (category === "model-adapter" || category === "generation") {
    if (AUTH_KEYWORDS.some((keyword) => text.includes(keyword))) return "high";
  }
  if (category === "rendering") return "high";

  switch (category) {
    case "asset-management":
    case "template":
    case "scene-processing":
    case "validation":
      return "medium";
    case "network":
    case "timeout":
    case "rate-limit":
      return "low";
    default:
      return "medium";
  }
}

export const USER_MESSAGES: Record<ErrorCategory, string> = {
  "model-adapter":
    "There was an issue connecting to the AI video generation service. This might be due to network issues or API configuration.",
  generation: "Video generation failed. This could be due to invalid parameters or service issues.",
  "asset-management": "Asset management operation failed. Please check file permissions and available storage space.",
  workflow: "The video generation workflow encountered an issue. The task may need to be restarted.",
  configuration: "Configuration validation failed. Please check your video generation settings.",
  rendering: "Video rendering failed. This might be due to insufficient resources or invalid scene data.",
  template: "Template processing failed. The selected template may be corrupted or incompatible.",
  "scene-processing": "Scene processing failed. Please check your scene configuration and input data.",
  network: "Network connection issue detected. Please check your internet connection.",
  timeout: "The operation took too long to complete. This might be due to high server load.",
  "rate-limit": "Too many requests have been made. Please wait a moment before trying again.",
  validation: "The input provided doesn't meet the required format or constraints.",
};

export const CIRCUIT_OPEN_MESSAGE = "Service temporarily unavailable due to repeated failures";

export const CIRCUIT_OPEN_USER_MESSAGE =
  "This service is temporarily unavailable due to repeated failures. Please try again in a few minutes.";

/** Guidance appended to the category message, first matching rule wins */
const GUIDANCE: Array<{ keywords: string[]; hint: string }> = [
  { keywords: ["api key", "authentication"], hint: "Please check your API key configuration." },
  { keywords: ["file size", "too large"], hint: "The file may be too large. Try a smaller file or different format." },
  { keywords: ["timeout", "connection"], hint: "This is usually temporary. Please try again in a moment." },
  {
    keywords: ["memory", "resource"],
    hint: "The system may be running low on resources. Try reducing the complexity of your request.",
  },
];

/**
 * Human-readable message for a failure: the category's message plus guidance
 * keyed on the underlying error text.
 */
export function generateUserMessage(error: unknown, category: ErrorCategory): string {
  const base = USER_MESSAGES[category];
  const text = errorMessage(error).toLowerCase();
  const rule = GUIDANCE.find(({ keywords }) => keywords.some((keyword) => text.includes(keyword)));
  return rule ? `${base} ${rule.hint}` : base;
}
