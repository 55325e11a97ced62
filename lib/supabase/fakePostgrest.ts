/**
 * In-process stand-in for the PostgREST endpoint behind a Supabase client. Records every
 * request and answers from a handler, so store and ledger tests never reach the network.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { createServiceRoleClient } from "./service";

export type RecordedRequest = {
  method: string;
  /** Path below /rest/v1, e.g. "/credit_scores" or "/rpc/nearest_farms". */
  path: string;
  params: URLSearchParams;
  body: unknown;
};

export type FakeReply = { status: number; body?: unknown };

export function createFakeSupabase(handler: (request: RecordedRequest) => FakeReply): {
  supabase: SupabaseClient;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const raw = init?.body;
    const request: RecordedRequest = {
      method: init?.method ?? "GET",
      path: url.pathname.replace(/^\/rest\/v1/, ""),
      params: url.searchParams,
      body: typeof raw === "string" && raw.length > 0 ? JSON.parse(raw) : null,
    };
    requests.push(request);
    const reply = handler(request);
    return new Response(reply.body === undefined ? "" : JSON.stringify(reply.body), {
      status: reply.status,
      headers: { "content-type": "application/json" },
    });
  };
  const supabase = createServiceRoleClient(
    { SUPABASE_URL: "http://supabase.test", SUPABASE_SERVICE_ROLE_KEY: "test-secret" },
    fetchImpl
  );
  return { supabase, requests };
}
