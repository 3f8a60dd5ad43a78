// Timestamps are Date rows inside the service and ISO-8601 strings on the wire
export interface User<TTimestamp = string> {
  id: number;
  email: string;
  full_name: string;
  is_active: boolean;
  created_at: TTimestamp;
}

export interface UserCreate {
  email: string;
  full_name: string;
  is_active?: boolean;
}

export interface Post<TTimestamp = string> {
  id: number;
  title: string;
  content: string;
  is_published: boolean;
  created_at: TTimestamp;
  owner_id: number;
}

export interface PostWithOwner<TTimestamp = string> extends Post<TTimestamp> {
  owner: User<TTimestamp>;
}

export interface PostCreate {
  title: string;
  content: string;
  is_published?: boolean;
}

export interface FibonacciResult {
  n: number;
  fibonacci: number;
}

export interface SumResult {
  n: number;
  sum: number;
}

export interface HealthStatus {
  status: "healthy";
  database: "connected";
}

export interface ServiceDescriptor {
  name: string;
  version: string;
  endpoints: Record<string, string>;
}

export interface ApiResponse<T> {
  data: T;
}

export interface ApiError {
  error: string;
}
