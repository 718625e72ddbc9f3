export interface HttpRequest {
  url: string;
  method: 'POST';
  headers: Record<string, string>;
  body: string;
  signal?: AbortSignal;
  timeout?: number;
}

export interface HttpResponseBody {
  text(): Promise<string>;
  dump(): Promise<void>;
}

export interface HttpResponse {
  statusCode: number;
  headers: Record<string, string | string[] | undefined>;
  body: HttpResponseBody;
}

export interface HttpTransport {
  execute(request: HttpRequest): Promise<HttpResponse>;
}
