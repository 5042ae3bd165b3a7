import type { ApiResponse, HttpTransport } from './http'

export type HealthStatus = { status: 'ok' }

export class HealthApi {
  constructor(private readonly http: HttpTransport) {}

  check(): Promise<ApiResponse<HealthStatus>> {
    return this.http.request<HealthStatus>('GET', '/health/')
  }

  /** True only for a 200 carrying `{ status: "ok" }`. */
  async isHealthy(): Promise<boolean> {
    const res = await this.check()
    return res.status === 200 && res.data?.status === 'ok'
  }
}
