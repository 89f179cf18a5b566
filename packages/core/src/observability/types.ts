/**
 * Observability types for Axiom tracing
 */

export interface TraceAttributes {
  requestId?: string
  stage?: string
  [key: string]: string | number | boolean | undefined
}
