// backend/services/scoring/src/constants.ts
export const SERVICE_NAME = "scoring" as const;
