export type RequestHeaders = Readonly<Record<string, string>>;

export type ApiHeaderInput = {
  contentType: string;
  accept?: string;
  token?: string;
  proxyTicket?: string;
};

const authSchemePattern = /^(basic|bearer)\s/i;

/**
 * Builds a fresh, frozen header set for one request. A token that already names
 * its scheme goes into `Authorization`, a bare token into the `token` header.
 */
export const buildApiHeaders = ({ contentType, accept, token, proxyTicket }: ApiHeaderInput): RequestHeaders => {
  const headers: Record<string, string> = {
    Accept: accept ?? contentType,
    "Content-Type": contentType
  };

  const normalizedToken = token?.trim();
  if (normalizedToken) {
    if (authSchemePattern.test(normalizedToken)) {
      headers.Authorization = normalizedToken;
    } else {
      headers.token = normalizedToken;
    }
  }

  const normalizedTicket = proxyTicket?.trim();
  if (normalizedTicket) {
    headers["proxy-ticket"] = normalizedTicket;
  }

  return Object.freeze(headers);
};

export const hasCallerCredentials = (headers: RequestHeaders): boolean =>
  headers.Authorization != null || headers.token != null;
