import axios from 'axios';
import { describeHttpError } from '../utils/http.js';
import type { HealthProbe } from './types.js';

/**
 * GET the health URL once; any 2xx is healthy. Never throws.
 */
export const httpHealthProbe: HealthProbe = async (url, timeoutMs) => {
  try {
    await axios.get(url, { timeout: timeoutMs, validateStatus: (status) => status >= 200 && status < 300 });
    return { ok: true };
  } catch (error) {
    return { ok: false, reason: describeHttpError(error) };
  }
};
