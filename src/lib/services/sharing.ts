// Share text through the platform share sheet, falling back to the clipboard.
import { isAbortError } from '../loaders';

export interface ShareResult { ok: boolean; method?: 'web-share' | 'clipboard'; error?: string }

type ShareNavigator = {
  share?: (data: ShareData) => Promise<void>;
  clipboard?: { writeText(text: string): Promise<void> };
};

export async function share(text: string, nav: ShareNavigator = navigator): Promise<ShareResult> {
  if (typeof nav.share === 'function') {
    try {
      await nav.share({ title: 'Astrotone', text });
      return { ok: true, method: 'web-share' };
    } catch (e) {
      // user dismissed the sheet
      if (isAbortError(e)) return { ok: false, error: 'cancelled' };
      console.warn('[share] web share failed, trying clipboard', e);
    }
  }
  if (nav.clipboard) {
    try {
      await nav.clipboard.writeText(text);
      return { ok: true, method: 'clipboard' };
    } catch (e) {
      console.error('[share] clipboard write failed', e);
      return { ok: false, error: e instanceof Error && e.message ? e.message : 'clipboard-failed' };
    }
  }
  return { ok: false, error: 'unsupported' };
}
