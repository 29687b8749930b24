import fetch from "node-fetch";

export interface SupabaseRestClientConfig {
  url: string;
  serviceRoleKey: string;
  timeoutMs: number;
}

export class SupabaseRestClient {
  constructor(private readonly config: SupabaseRestClientConfig) {}

  async insert(table: string, payload: Record<string, unknown>): Promise<void> {
    const response = await fetch(`${this.config.url}/rest/v1/${table}`, {
      method: "POST",
      headers: this.baseHeaders({
        prefer: "return=minimal",
      }),
      body: JSON.stringify(payload),
      timeout: this.config.timeoutMs,
    });

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase insert failed: HTTP ${response.status} - ${body}`);
    }
  }

  async selectOne<T>(
    table: string,
    filters: Record<string, string | number>,
    columns = "*",
  ): Promise<T | null> {
    const query = new URLSearchParams();
    query.set("select", columns);
    for (const [key, value] of Object.entries(filters)) {
      query.set(key, `eq.${value}`);
    }
    query.set("limit", "1");

    const response = await fetch(
      `${this.config.url}/rest/v1/${table}?${query.toString()}`,
      {
        method: "GET",
        headers: this.baseHeaders({
          accept: "application/json",
        }),
        timeout: this.config.timeoutMs,
      },
    );

    if (!response.ok) {
      const body = await response.text();
      throw new Error(`Supabase select failed: HTTP ${response.status} - ${body}`);
    }

    const rows = (await response.json()) as T[];
    if (!Array.isArray(rows) || !rows.length) {
      return null;
    }
    return rows[0];
  }

  private baseHeaders(extraHeaders?: Record<string, string>): Record<string, string> {
    return {
      apikey: this.config.serviceRoleKey,
      authorization: `Bearer ${this.config.serviceRoleKey}`,
      "content-type": "application/json",
      ...(extraHeaders ?? {}),
    };
  }
}
