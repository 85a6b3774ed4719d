// utils/apiClient.ts
import axios from 'axios';
import logger from './logger';
import { CONSTANTS } from './constants';

const apiClient = axios.create({
    timeout: CONSTANTS.TIMEOUTS.DEFAULT_API,
    headers: {
        'User-Agent': 'ResearchPost-Backend/1.0',
        'Accept': 'application/json'
    }
});

// Log timed-out requests; the caller decides what a failure means.
apiClient.interceptors.response.use(
    (response) => response,
    (error: unknown) => {
        if (axios.isAxiosError(error) && error.code === 'ECONNABORTED') {
            logger.warn(`⚠️ Request timed out: ${error.config?.url}`);
        }
        return Promise.reject(error);
    }
);

export default apiClient;
