import { Tracer } from "./tracer.js"

const CMDSIG_TRACER_NAME = "cmdsig"

/**
 * Return an OpenTelemetry tracer.
 *
 * Spans are dropped unless the host application registers an OpenTelemetry SDK.
 */
export function getTracer(name = CMDSIG_TRACER_NAME): Tracer {
  return new Tracer(name)
}

export type { Tracer } from "./tracer.js"
