import type { IWebResult } from '../../types';

export interface IWebSearchProvider {
    name: string;
    isConfigured(): boolean;
    searchWeb(query: string, maxResults: number): Promise<IWebResult[]>;
}
