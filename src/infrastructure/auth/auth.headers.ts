import type { HttpRequest } from "../../core/http/http.types";

export const AUTHORIZATION_HEADER = "Authorization";

export const withAuthorization = (request: HttpRequest, value: string): HttpRequest => ({
  ...request,
  headers: { ...request.headers, [AUTHORIZATION_HEADER]: value }
});

export const authorizationOf = (request: HttpRequest): string | undefined => {
  for (const [name, value] of Object.entries(request.headers)) {
    if (name.toLowerCase() === "authorization") return value;
  }
  return undefined;
};
