import axios, {
  AxiosError,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from "axios";
import { describe, expect, it } from "vitest";
import { NcbiCoreApiClient } from "../../src/services/NCBI/core/ncbiCoreApiClient.js";
import { NcbiRequestQueueManager } from "../../src/services/NCBI/core/ncbiRequestQueueManager.js";
import { NcbiResponseHandler } from "../../src/services/NCBI/core/ncbiResponseHandler.js";
import { NcbiService } from "../../src/services/NCBI/core/ncbiService.js";
import { BaseErrorCode } from "../../src/types-global/errors.js";
import { captureMcpError } from "../helpers/errors.js";
import { testContext } from "../helpers/fakes.js";

type Responder = (config: InternalAxiosRequestConfig) => string;

/** An NcbiService whose HTTP layer answers in process. */
function serviceWith(respond: Responder | Error) {
  const requests: InternalAxiosRequestConfig[] = [];
  const instance = axios.create({
    responseType: "text",
    transformResponse: (data: unknown) => data,
    adapter: async (config): Promise<AxiosResponse<unknown>> => {
      requests.push(config);
      if (respond instanceof Error) throw respond;
      return { data: respond(config), status: 200, statusText: "OK", headers: {}, config };
    },
  });
  const service = new NcbiService(
    new NcbiRequestQueueManager(0),
    new NcbiCoreApiClient(instance),
    new NcbiResponseHandler(),
  );
  return { service, requests };
}

describe("NcbiService", () => {
  it("maps an ESearch response to a typed result", async () => {
    const { service, requests } = serviceWith(
      () =>
        "<eSearchResult><Count>57</Count><RetMax>2</RetMax><RetStart>0</RetStart>" +
        "<IdList><Id>111</Id><Id>222</Id></IdList>" +
        "<QueryTranslation>Doe, Jane[Author]</QueryTranslation></eSearchResult>",
    );

    const result = await service.eSearch(
      { db: "pubmed", term: "Jane Doe[Author]", retmax: 2 },
      testContext(),
    );

    expect(result).toEqual({
      count: 57,
      retmax: 2,
      retstart: 0,
      idList: ["111", "222"],
      queryTranslation: "Doe, Jane[Author]",
    });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://eutils.ncbi.nlm.nih.gov/entrez/eutils/esearch.fcgi");
    expect(requests[0]?.params).toMatchObject({ db: "pubmed", term: "Jane Doe[Author]", retmax: "2" });
  });

  it("returns an empty id list when nothing matches", async () => {
    const { service } = serviceWith(
      () =>
        "<eSearchResult><Count>0</Count><RetMax>0</RetMax><RetStart>0</RetStart><IdList/>" +
        "<ErrorList><PhraseNotFound>zzqxv</PhraseNotFound></ErrorList></eSearchResult>",
    );

    const result = await service.eSearch({ db: "pubmed", term: "zzqxv[Author]" }, testContext());

    expect(result.count).toBe(0);
    expect(result.idList).toEqual([]);
  });

  it("sends EFetch identifiers as a comma-joined GET parameter", async () => {
    const { service, requests } = serviceWith(() => "<PubmedArticleSet></PubmedArticleSet>");

    await service.eFetch({ db: "pubmed", id: "111,222", retmode: "xml" }, testContext());

    expect(requests[0]?.method).toBe("get");
    expect(requests[0]?.url).toBe("https://eutils.ncbi.nlm.nih.gov/entrez/eutils/efetch.fcgi");
    expect(requests[0]?.params).toMatchObject({ db: "pubmed", id: "111,222", retmode: "xml" });
  });

  it("reports transport failures as SOURCE_UNAVAILABLE", async () => {
    const { service } = serviceWith(new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"));

    const error = await captureMcpError(() =>
      service.eSearch({ db: "pubmed", term: "x[Title]" }, testContext()),
    );

    expect(error.code).toBe(BaseErrorCode.SOURCE_UNAVAILABLE);
    expect(error.message).toBe("NCBI request failed: connect ECONNREFUSED");
  });
});
