export const DEFAULT_BASE_URL = "http://localhost:5000/backup";

// 09:30 every day
export const DEFAULT_SCHEDULE = "30 9 * * *";

export const DEFAULT_TOKEN = "ZIMMERMAN";

// Matches the backend worker timeout.
export const DEFAULT_TIMEOUT_SECONDS = 600;

// Largest delay a Node timer (and so AbortSignal.timeout) accepts: 2^31 - 1 ms.
export const MAX_TIMEOUT_SECONDS = 2147483;

export const DEFAULT_STATE_DIR_NAME = ".dx-refresh";

export const CONFIG_FILE_NAMES = ["dx-refresh.config.json", ".dx-refreshrc.json"];

export const REFRESH_ROUTES = {
  updateDatasets: "/update-tgf-datasets",
  forceUpdateDataset: "/force-update-tgf-dataset",
  healthCheck: "/health-check",
  dataset: "/dataset",
  sampleData: "/sample-data"
} as const;

export const DEFAULT_PAGE_SIZE = 10;

export const TGF_DATASETS = [
  "gf_results",
  "gf_pledges_contributions",
  "gf_eligibility",
  "gf_allocations",
  "gf_grant_implementation",
  "gf_grant_commitments",
  "gf_grant_disbursements",
  "gf_grant_budgets",
  "gf_grant_expenditures_modules_interventions",
  "gf_grant_expenditures_investment_landscape",
  "gf_grant_targets_results"
] as const;

export type TgfDatasetName = (typeof TGF_DATASETS)[number];

export function isTgfDatasetName(value: string): value is TgfDatasetName {
  return TGF_DATASETS.some((name) => name === value);
}
