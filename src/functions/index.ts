import type { FunctionConfig } from "../lib/http.js";
import type { Services } from "../lib/services.js";
import analyzeCompany, { config as analyzeCompanyConfig } from "./analyze-company.js";
import authenticate, { config as authenticateConfig } from "./authenticate.js";
import clearCache, { config as clearCacheConfig } from "./clear-cache.js";
import exportHistory, { config as exportHistoryConfig } from "./export-history.js";
import exportStatus, { config as exportStatusConfig } from "./export-status.js";
import health, { config as healthConfig } from "./health.js";
import search, { config as searchConfig } from "./search.js";
import startExport, { config as startExportConfig } from "./start-export.js";
import stopExport, { config as stopExportConfig } from "./stop-export.js";

export type FunctionHandler = (req: Request, services: Services) => Promise<Response>;

export interface FunctionModule {
  handler: FunctionHandler;
  config: FunctionConfig;
}

export const functions: FunctionModule[] = [
  { handler: search, config: searchConfig },
  { handler: analyzeCompany, config: analyzeCompanyConfig },
  { handler: startExport, config: startExportConfig },
  { handler: exportStatus, config: exportStatusConfig },
  { handler: stopExport, config: stopExportConfig },
  { handler: exportHistory, config: exportHistoryConfig },
  { handler: clearCache, config: clearCacheConfig },
  { handler: authenticate, config: authenticateConfig },
  { handler: health, config: healthConfig },
];
