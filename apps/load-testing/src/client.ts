import type { PostCreate, UserCreate } from "@loadlab/types";

/** A non-2xx answer. Transport failures reject with fetch's own error. */
export class RequestFailedError extends Error {
  constructor(
    readonly method: string,
    readonly path: string,
    readonly status: number,
    readonly body: string,
  ) {
    super(`${method} ${path} failed with ${status}`);
    this.name = "RequestFailedError";
  }
}

/** The calls the load script makes. Resolved values are never inspected. */
export interface LoadTarget {
  health(): Promise<unknown>;
  createUser(seq: number): Promise<unknown>;
  listUsers(skip: number, limit: number): Promise<unknown>;
  createPost(ownerId: number, seq: number): Promise<unknown>;
  fibonacci(n: number): Promise<unknown>;
  sum(n: number): Promise<unknown>;
}

export function userFixture(seq: number): UserCreate {
  return { email: `user${seq}@example.com`, full_name: `User ${seq}`, is_active: true };
}

export function postFixture(ownerId: number, seq: number): PostCreate {
  return {
    title: `Post ${seq} by User ${ownerId}`,
    content: `This is the content of post ${seq}. `.repeat(10),
    is_published: true,
  };
}

export class ApiClient implements LoadTarget {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  // Resolves to the decoded JSON body
  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "content-type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    if (!res.ok) {
      throw new RequestFailedError(method, path, res.status, await res.text());
    }
    return res.json();
  }

  health() {
    return this.request("GET", "/health");
  }

  createUser(seq: number) {
    return this.request("POST", "/users/", userFixture(seq));
  }

  listUsers(skip: number, limit: number) {
    return this.request("GET", `/users/?skip=${skip}&limit=${limit}`);
  }

  createPost(ownerId: number, seq: number) {
    return this.request("POST", `/users/${ownerId}/posts/`, postFixture(ownerId, seq));
  }

  fibonacci(n: number) {
    return this.request("GET", `/compute/fibonacci/${n}`);
  }

  sum(n: number) {
    return this.request("GET", `/compute/sum/${n}`);
  }
}
