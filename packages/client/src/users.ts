import type { CreateUserInput, PartialUpdateBody, ReplaceUserInput } from '@user-registry/domain'
import type { ApiResponse, HttpTransport } from './http'

/** A user as returned over the wire. */
export type User = {
  id: string
  name: string
  phone: string
  address: string
}

/**
 * Every /users endpoint. Adding an endpoint here forces UsersApi (and any
 * fake used in tests) to implement it.
 */
export interface UserEndpoints {
  create(user: CreateUserInput): Promise<ApiResponse<User>>
  get(id: string): Promise<ApiResponse<User>>
  list(): Promise<ApiResponse<User[]>>
  listIds(): Promise<ApiResponse<string[]>>
  replace(id: string, body: ReplaceUserInput): Promise<ApiResponse<User>>
  partialUpdate(id: string, body: PartialUpdateBody): Promise<ApiResponse<User>>
  delete(id: string): Promise<ApiResponse<null>>
}

const userPath = (id: string) => `/users/${encodeURIComponent(id)}/`

export class UsersApi implements UserEndpoints {
  constructor(private readonly http: HttpTransport) {}

  create(user: CreateUserInput): Promise<ApiResponse<User>> {
    return this.http.request<User>('POST', '/users/', user)
  }

  get(id: string): Promise<ApiResponse<User>> {
    return this.http.request<User>('GET', userPath(id))
  }

  list(): Promise<ApiResponse<User[]>> {
    return this.http.request<User[]>('GET', '/users/')
  }

  listIds(): Promise<ApiResponse<string[]>> {
    return this.http.request<string[]>('GET', '/users/ids/')
  }

  /** Sends the path id in the body when the caller left it out. */
  replace(id: string, body: ReplaceUserInput): Promise<ApiResponse<User>> {
    const payload = body.id === undefined ? { ...body, id } : body
    return this.http.request<User>('PUT', userPath(id), payload)
  }

  /** The server rejects any body that mentions `id`. */
  partialUpdate(id: string, body: PartialUpdateBody): Promise<ApiResponse<User>> {
    return this.http.request<User>('PATCH', userPath(id), body)
  }

  delete(id: string): Promise<ApiResponse<null>> {
    return this.http.request<null>('DELETE', userPath(id))
  }
}
