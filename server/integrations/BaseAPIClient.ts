// BASE API CLIENT FOR THE SMARTSHEET INTEGRATION
// Provides authenticated JSON and binary requests, query building and response validation.

import Ajv, { type Schema } from 'ajv';
import { getErrorMessage } from '../types/common';

export interface APICredentials {
  apiKey?: string;
  accessToken?: string;
}

export interface APIResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  statusCode?: number;
  headers?: Record<string, string>;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type QueryValue = string | number | boolean | null | undefined | Array<string | number>;

export abstract class BaseAPIClient {
  // Ajv caches compiled validators per schema object.
  private static readonly ajv = new Ajv({ allErrors: true, strict: false });

  protected baseURL: string;
  protected credentials: APICredentials;

  constructor(baseURL: string, credentials: APICredentials) {
    this.baseURL = baseURL;
    this.credentials = credentials;
  }

  /**
   * Make authenticated HTTP request with a JSON body
   */
  protected async makeRequest(
    method: HttpMethod,
    endpoint: string,
    data?: unknown,
    headers: Record<string, string> = {}
  ): Promise<APIResponse<unknown>> {
    return this.send(method, endpoint, {
      headers: { 'Content-Type': 'application/json', ...headers },
      body: data === undefined ? undefined : JSON.stringify(data),
    });
  }

  /**
   * Make authenticated HTTP request whose body is raw bytes (file uploads)
   */
  protected async makeBinaryRequest(
    method: HttpMethod,
    endpoint: string,
    body: Buffer,
    headers: Record<string, string>
  ): Promise<APIResponse<unknown>> {
    return this.send(method, endpoint, { headers, body });
  }

  private async send(
    method: HttpMethod,
    endpoint: string,
    request: { headers: Record<string, string>; body?: RequestInit['body'] }
  ): Promise<APIResponse<unknown>> {
    try {
      const url = this.buildRequestUrl(endpoint);
      const requestOptions: RequestInit = {
        method,
        headers: {
          'User-Agent': 'PropertySchedule-Automation/1.0',
          ...this.getAuthHeaders(),
          ...request.headers,
        },
        body: request.body,
      };

      const response = await fetch(url, requestOptions);
      const responseText = await response.text();
      let responseData: unknown = null;

      try {
        responseData = responseText ? JSON.parse(responseText) : null;
      } catch {
        responseData = responseText;
      }

      if (!response.ok) {
        return {
          success: false,
          error: this.describeFailure(response, responseData),
          statusCode: response.status,
          data: responseData,
        };
      }

      return {
        success: true,
        data: responseData,
        statusCode: response.status,
        headers: Object.fromEntries(response.headers.entries()),
      };
    } catch (error) {
      return {
        success: false,
        error: getErrorMessage(error),
        statusCode: 0,
      };
    }
  }

  /**
   * Narrows a raw response to `T` by validating its body against `schema`.
   * Failed requests pass through without their body; a body that does not
   * match becomes a failed response.
   */
  protected withSchema<T>(schema: Schema, response: APIResponse<unknown>): APIResponse<T> {
    const { data, ...rest } = response;
    if (!response.success) {
      return rest;
    }

    try {
      return { ...rest, data: this.validatePayload<T>(schema, data) };
    } catch (error) {
      return { success: false, error: getErrorMessage(error), statusCode: response.statusCode };
    }
  }

  private describeFailure(response: Response, body: unknown): string {
    const base = `HTTP ${response.status}: ${response.statusText}`;
    if (body && typeof body === 'object' && 'message' in body && typeof body.message === 'string') {
      return `${base} - ${body.message}`;
    }
    return base;
  }

  private buildRequestUrl(endpoint: string): string {
    if (/^https?:\/\//i.test(endpoint)) {
      return endpoint;
    }

    if (!this.baseURL) {
      throw new Error('Base URL is not configured for this API client');
    }

    if (endpoint.startsWith('/') && this.baseURL.endsWith('/')) {
      return `${this.baseURL}${endpoint.slice(1)}`;
    }

    if (endpoint.startsWith('/') || this.baseURL.endsWith('/')) {
      return `${this.baseURL}${endpoint}`;
    }

    return `${this.baseURL}/${endpoint}`;
  }

  /**
   * GET request
   */
  protected async get(endpoint: string, headers?: Record<string, string>): Promise<APIResponse<unknown>> {
    return this.makeRequest('GET', endpoint, undefined, headers);
  }

  /**
   * POST request
   */
  protected async post(endpoint: string, data?: unknown, headers?: Record<string, string>): Promise<APIResponse<unknown>> {
    return this.makeRequest('POST', endpoint, data, headers);
  }

  /**
   * PUT request
   */
  protected async put(endpoint: string, data?: unknown, headers?: Record<string, string>): Promise<APIResponse<unknown>> {
    return this.makeRequest('PUT', endpoint, data, headers);
  }

  /**
   * Get authentication headers (to be implemented by subclasses)
   */
  protected abstract getAuthHeaders(): Record<string, string>;

  /**
   * Test API connection
   */
  public abstract testConnection(): Promise<APIResponse<unknown>>;

  /**
   * Build query string from parameters
   */
  protected buildQueryString(params: Record<string, QueryValue>): string {
    const searchParams = new URLSearchParams();

    Object.entries(params).forEach(([key, value]) => {
      if (value !== undefined && value !== null) {
        if (Array.isArray(value)) {
          value.forEach(item => searchParams.append(key, String(item)));
        } else {
          searchParams.append(key, String(value));
        }
      }
    });

    const queryString = searchParams.toString();
    return queryString ? `?${queryString}` : '';
  }

  /**
   * Validate required parameters
   */
  protected validateRequiredParams(params: object, required: string[]): void {
    const values = new Map<string, unknown>(Object.entries(params));
    const missing = required.filter(param => {
      const value = values.get(param);
      return value === undefined || value === null || value === '';
    });

    if (missing.length > 0) {
      throw new Error(`Missing required parameters: ${missing.join(', ')}`);
    }
  }

  protected validatePayload<T>(schema: Schema, payload: unknown): T {
    const validator = BaseAPIClient.ajv.compile<T>(schema);
    if (validator(payload)) {
      return payload;
    }

    const errors = (validator.errors || []).map(error => {
      const location = error.instancePath || error.schemaPath;
      return `${location}: ${error.message || 'invalid value'}`;
    });
    throw new Error(`Payload validation failed: ${errors.join('; ')}`);
  }
}
