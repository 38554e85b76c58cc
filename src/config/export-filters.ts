/**
 * EXPORT FILTERS
 *
 * The bulk export always runs this query. Interactive search takes its
 * filters from the request instead.
 *
 * Edit THIS FILE to export a different slice of the company database.
 */

import type { SearchFilters } from "../lib/types.js";

export const exportFilters: SearchFilters = {
  min_employees: 50,
  max_employees: 1000,
  funding_stages: ["series_a", "series_b", "series_c"],
};

/** Countries every company query is restricted to (lower-case, as indexed upstream). */
export const TARGET_COUNTRIES: string[] = ["canada", "united states"];
