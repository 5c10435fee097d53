/**
 * GET /alerting/health
 *
 * Unauthenticated; answers 503 while the store is unreachable.
 */

import { getContainer } from "../../container"
import { jsonResponse, route } from "../http"
import { presentHealth } from "../presenters"

export const healthHandler = route("HealthAPI", async () => {
  const report = await getContainer().health.check()
  return jsonResponse(report.status === "ok" ? 200 : 503, presentHealth(report))
})
