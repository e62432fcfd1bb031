import axios from 'axios';

/**
 * Shared axios instance for outbound calls (statistics API, Telegram).
 * Per-call timeouts override the default below.
 */
export const httpClient = axios.create({
  timeout: 10000,
  headers: {
    'User-Agent': 'TubePulse/1.0'
  }
});

httpClient.interceptors.response.use(
  response => response,
  (error: unknown) => {
    if (axios.isAxiosError(error) && error.response) {
      error.message = `HTTP ${error.response.status}: ${error.response.statusText}`;
    }
    return Promise.reject(error);
  }
);
