/**
 * @fileoverview Service for the NCBI E-utilities used by this application
 * (ESearch and EFetch). Every call goes through the rate-limiting queue,
 * the HTTP client and the response handler, in that order.
 * @module src/services/NCBI/core/ncbiService
 */

import { BaseErrorCode, McpError } from "../../../types-global/errors.js";
import {
  type ESearchResult,
  XmlESearchResponseSchema,
} from "../../../types-global/pubmedXml.js";
import {
  logger,
  type RequestContext,
  requestContextService,
} from "../../../utils/index.js";
import { getText } from "../parsing/xmlGenericHelpers.js";
import {
  type NcbiEndpoint,
  type NcbiRequestParams,
} from "./ncbiConstants.js";
import { NcbiCoreApiClient } from "./ncbiCoreApiClient.js";
import { NcbiRequestQueueManager } from "./ncbiRequestQueueManager.js";
import { NcbiResponseHandler } from "./ncbiResponseHandler.js";

/**
 * The two E-utility calls the PubMed client depends on. Tests substitute
 * an in-memory implementation.
 */
export interface EUtilities {
  eSearch(params: NcbiRequestParams, context: RequestContext): Promise<ESearchResult>;
  /** Returns the parsed EFetch XML document. */
  eFetch(params: NcbiRequestParams, context: RequestContext): Promise<unknown>;
}

export class NcbiService implements EUtilities {
  constructor(
    private readonly queueManager = new NcbiRequestQueueManager(),
    private readonly apiClient = new NcbiCoreApiClient(),
    private readonly responseHandler = new NcbiResponseHandler(),
  ) {}

  private async performNcbiRequest(
    endpoint: NcbiEndpoint,
    params: NcbiRequestParams,
    context: RequestContext,
  ): Promise<unknown> {
    const task = async () => {
      const rawResponse = await this.apiClient.makeRequest(
        endpoint,
        params,
        context,
      );
      return this.responseHandler.parseAndHandleResponse(
        rawResponse,
        endpoint,
        context,
      );
    };

    return this.queueManager.enqueueRequest(task, context, endpoint);
  }

  public async eSearch(
    params: NcbiRequestParams,
    context: RequestContext,
  ): Promise<ESearchResult> {
    const response = await this.performNcbiRequest("esearch", params, context);

    const parsed = XmlESearchResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new McpError(
        BaseErrorCode.NCBI_PARSING_ERROR,
        "Invalid or empty ESearch response from NCBI.",
        { issues: parsed.error.issues.slice(0, 3) },
      );
    }

    const esResult = parsed.data.eSearchResult;
    const queryTranslation = getText(esResult.QueryTranslation);
    return {
      count: esResult.Count,
      retmax: esResult.RetMax,
      retstart: esResult.RetStart,
      idList: (esResult.IdList?.Id ?? []).map((id) => getText(id)).filter(Boolean),
      ...(queryTranslation ? { queryTranslation } : {}),
    };
  }

  public async eFetch(
    params: NcbiRequestParams,
    context: RequestContext,
  ): Promise<unknown> {
    return this.performNcbiRequest("efetch", params, context);
  }
}

let ncbiServiceInstance: NcbiService | undefined;

export function getNcbiService(): NcbiService {
  if (!ncbiServiceInstance) {
    ncbiServiceInstance = new NcbiService();
    logger.debug(
      "NcbiService lazily initialized.",
      requestContextService.createRequestContext({
        service: "NcbiService",
        operation: "getNcbiServiceInstance",
      }),
    );
  }
  return ncbiServiceInstance;
}
