/**
 * In-process axios instance for client tests: requests are answered by a
 * handler instead of the network
 */

import axios, { AxiosError, AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';

export interface StubResponse {
    status: number;
    data: unknown;
}

export type StubHandler = (config: InternalAxiosRequestConfig) => StubResponse | Promise<StubResponse>;

export interface AxiosStub {
    client: AxiosInstance;
    requests: InternalAxiosRequestConfig[];
}

export function stubAxios(handler: StubHandler): AxiosStub {
    const requests: InternalAxiosRequestConfig[] = [];
    const client = axios.create({
        baseURL: 'http://upstream.test',
        adapter: async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
            requests.push(config);
            const { status, data } = await handler(config);
            const response: AxiosResponse = {
                data,
                status,
                statusText: String(status),
                headers: {},
                config,
            };
            if (status >= 400) {
                throw new AxiosError(
                    `Request failed with status code ${status}`,
                    status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
                    config,
                    undefined,
                    response
                );
            }
            return response;
        },
    });
    return { client, requests };
}

/**
 * Connection-level failure with no response, as axios reports a reset socket
 */
export function networkError(config: InternalAxiosRequestConfig): AxiosError {
    return new AxiosError('socket hang up', 'ECONNRESET', config);
}
