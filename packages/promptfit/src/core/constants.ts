// Token estimation defaults
/** Approximate characters per token used when no tokenizer is supplied */
export const CHARS_PER_TOKEN = 4;

// Condensation defaults
/** Summaries estimating above `targetTokens * this` are replaced by truncation */
export const DEFAULT_OVERSHOOT_FACTOR = 1.2;

/** Characters kept per target token on the first truncation pass */
export const DEFAULT_TRUNCATE_CHARS_PER_TOKEN = 3.5;

/** Characters kept per target token on the single hard cut that follows */
export const DEFAULT_HARD_CHARS_PER_TOKEN = 3.0;

// Assembly defaults
/** Separator counted after every committed component */
export const DEFAULT_COMPONENT_SEPARATOR = "\n";

/** Characters per remaining token when a critical first component is cut */
export const DEFAULT_CRITICAL_CHARS_PER_TOKEN = 3;

/** Well-known component keys */
export const COMPONENT_KEYS = {
  systemMessage: "system_message",
  userQuery: "user_query",
  taskInstructions: "task_instructions",
  history: "history",
  retrievedKnowledge: "retrieved_knowledge",
  operationalContext: "operational_context",
} as const;

/** Highest priority first */
export const DEFAULT_PRIORITY_ORDER: readonly string[] = [
  COMPONENT_KEYS.userQuery,
  COMPONENT_KEYS.systemMessage,
  COMPONENT_KEYS.taskInstructions,
  COMPONENT_KEYS.history,
  COMPONENT_KEYS.retrievedKnowledge,
];

/** Components that are cut instead of omitted when they are first and do not fit */
export const DEFAULT_CRITICAL_KEYS: readonly string[] = [
  COMPONENT_KEYS.userQuery,
  COMPONENT_KEYS.systemMessage,
];

export const DEFAULT_COMPONENT_PREFIXES: Readonly<Record<string, string>> = {
  [COMPONENT_KEYS.userQuery]: "User: ",
  [COMPONENT_KEYS.taskInstructions]: "Instructions: ",
  [COMPONENT_KEYS.retrievedKnowledge]: "Context: ",
  [COMPONENT_KEYS.operationalContext]: "Recent activity: ",
};

// Observability defaults
/** Entries kept by an ObservabilitySink before the oldest is dropped */
export const DEFAULT_SINK_CAPACITY = 100;
