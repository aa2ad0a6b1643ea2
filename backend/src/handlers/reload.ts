import { errorMessage } from "../lib/errors";
import { getPipeline } from "../lib/pipeline";

/** Scheduled: swaps in freshly loaded reference data. A failed load keeps the previous snapshot. */
export const handler = async (): Promise<{ ok: boolean; loadedAt?: string; error?: string }> => {
  try {
    const { registry } = await getPipeline();
    const snapshot = await registry.reload();
    return { ok: true, loadedAt: snapshot.loadedAt };
  } catch (error) {
    console.error("reference_reload_error", error);
    return { ok: false, error: errorMessage(error) };
  }
};
