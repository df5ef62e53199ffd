// Shapes read back from `argocd app … --output json` (only fields we use)

// Entries under status.resources / status.conditions are passed through as decoded
export type ResourceStatus = unknown;
export type ApplicationCondition = unknown;
