import type { ProgrammeSnapshot } from "../domain/models.js";

/**
 * Fetches the programmes currently active for a market. Implementations
 * reject with `UpstreamError`.
 */
export interface ProgrammeSource {
  fetchActive(marketKey: string): Promise<ProgrammeSnapshot>;
}
