/**
 * @fileoverview Core client for making HTTP requests to NCBI E-utilities.
 * Assembles parameters (tool, email and API key included when configured),
 * issues a GET, and turns transport failures into
 * `SOURCE_UNAVAILABLE` errors. Requests are attempted once; there is no retry.
 * @module src/services/NCBI/core/ncbiCoreApiClient
 */

import axios, {
  type AxiosInstance,
  type AxiosRequestConfig,
  type AxiosResponse,
} from "axios";
import { config } from "../../../config/index.js";
import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  logger,
  type RequestContext,
  requestContextService,
  sanitizeInputForLogging,
} from "../../../utils/index.js";
import {
  NCBI_EUTILS_BASE_URL,
  type NcbiEndpoint,
  type NcbiRequestParams,
} from "./ncbiConstants.js";

export class NcbiCoreApiClient {
  private readonly axiosInstance: AxiosInstance;

  constructor(axiosInstance?: AxiosInstance) {
    this.axiosInstance =
      axiosInstance ??
      axios.create({
        timeout: config.ncbiTimeoutMs,
        // Response bodies are parsed by NcbiResponseHandler, not by axios.
        responseType: "text",
        transformResponse: (data: unknown) => data,
      });
  }

  /**
   * Makes one HTTP request to the given E-utility.
   * @throws {McpError} `SOURCE_UNAVAILABLE` on network errors, timeouts and non-2xx statuses.
   */
  public async makeRequest(
    endpoint: NcbiEndpoint,
    params: NcbiRequestParams,
    context: RequestContext,
  ): Promise<AxiosResponse<unknown>> {
    const rawParams: Record<string, string | number | undefined> = {
      tool: config.ncbiToolIdentifier,
      email: config.ncbiAdminEmail,
      api_key: config.ncbiApiKey,
      ...params,
    };

    const finalParams: Record<string, string> = {};
    for (const [key, value] of Object.entries(rawParams)) {
      if (value !== undefined) {
        finalParams[key] = String(value);
      }
    }

    const requestConfig: AxiosRequestConfig = {
      method: "GET",
      url: `${NCBI_EUTILS_BASE_URL}/${endpoint}.fcgi`,
      params: finalParams,
    };

    const requestContext = requestContextService.createRequestContext({
      parentRequestId: context.requestId,
      operation: "NCBI_HttpRequest",
      endpoint,
      method: requestConfig.method,
      requestParams: sanitizeInputForLogging(finalParams),
    });

    try {
      logger.debug(
        `Making NCBI HTTP request: ${requestConfig.method} ${requestConfig.url}`,
        requestContext,
      );
      return await this.axiosInstance.request<unknown>(requestConfig);
    } catch (error: unknown) {
      if (axios.isAxiosError(error)) {
        logger.error(`NCBI request to ${endpoint} failed`, error, {
          ...requestContext,
          status: error.response?.status,
          code: error.code,
        });
        throw new McpError(
          BaseErrorCode.SOURCE_UNAVAILABLE,
          `NCBI request failed: ${error.message}`,
          {
            endpoint,
            status: error.response?.status,
            details:
              typeof error.response?.data === "string"
                ? error.response.data.substring(0, 500)
                : undefined,
          },
        );
      }

      const err = error instanceof Error ? error : new Error(String(error));
      logger.error(`Unexpected error during NCBI request to ${endpoint}`, err, requestContext);
      throw new McpError(
        BaseErrorCode.SOURCE_UNAVAILABLE,
        `Unexpected error communicating with NCBI: ${err.message}`,
        { endpoint },
      );
    }
  }
}
