import type { PageRequest } from "./types";

/**
 * Change-tracking position of a job: created, or completed if later, capped at
 * the extraction's clock (the `?`). A future-dated completion would otherwise
 * carry the watermark past every job created before that date.
 */
export const CHANGED_AT =
  "LEAST(GREATEST(j.job_created, COALESCE(j.completed_date, j.job_created)), CAST(? AS DATETIME(3)))";

const SELECT_JOBS = `
SELECT
    j.job_id                AS job_id,
    c.client_name           AS customer,
    g.group_name            AS group_name,
    sg.straker_group_name   AS entity,
    j.job_created           AS job_created,
    j.quote                 AS quote,
    j.quote_nett            AS quote_nett,
    j.quote_currency        AS quote_currency,
    j.due_date              AS due_date,
    j.job_status            AS job_status,
    j.completed_date        AS completed_date,
    j.wip_completed_pct     AS wip_completed_pct,
    j.gross_margin          AS gross_margin,
    ${CHANGED_AT} AS changed_at
FROM jobs j
LEFT OUTER JOIN clients c
    ON c.client_uuid = j.client_uuid
LEFT OUTER JOIN \`groups\` g
    ON g.group_uuid = j.group_uuid
LEFT OUTER JOIN straker_groups sg
    ON sg.straker_group_uuid = g.entity_uuid`;

export interface BuiltQuery {
  sql: string;
  params: Array<string | number | Date>;
}

/**
 * Keyset page query. Full scans page on `job_id`; incremental scans page on
 * `(changed_at, job_id)` so rows sharing a timestamp resume without gaps.
 */
export function buildPageQuery(request: PageRequest): BuiltQuery {
  const asOf = new Date(request.asOf);
  const where = ["j.job_created >= ?"];
  // The select list's change column comes first.
  const params: BuiltQuery["params"] = [asOf, request.fromDate];
  let orderBy: string;

  if (request.mode === "full") {
    if (request.afterJobId !== null) {
      where.push("j.job_id > ?");
      params.push(request.afterJobId);
    }
    orderBy = "j.job_id";
  } else {
    if (request.after) {
      const after = new Date(request.after.changedAt);
      where.push(`(${CHANGED_AT} > ? OR (${CHANGED_AT} = ? AND j.job_id > ?))`);
      params.push(asOf, after, asOf, after, request.after.jobId);
    }
    orderBy = "changed_at, j.job_id";
  }

  params.push(request.limit);
  return {
    sql: `${SELECT_JOBS}\nWHERE ${where.join("\n  AND ")}\nORDER BY ${orderBy}\nLIMIT ?`,
    params,
  };
}
