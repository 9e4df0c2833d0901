import * as opentelemetry from "@opentelemetry/api"

/**
 * Tracer encapsulates the OpenTelemetry Tracer.
 */
export class Tracer {
  private tracer: opentelemetry.Tracer

  constructor(name: string) {
    this.tracer = opentelemetry.trace.getTracer(name)
  }

  /**
   * Execute the function inside a span with the given name using startActiveSpan.
   *
   * The span is ended when the function settles and marked as an error
   * if the function throws.
   *
   * @example
   * ```
   * return getTracer().startActiveSpan("resolve", async () => {
   *   return registry.resolve(command, subcommand)
   * })
   * ```
   */
  public async startActiveSpan<T>(
    name: string,
    fn: (span: opentelemetry.Span) => Promise<T> | T,
    attributes?: opentelemetry.Attributes,
  ): Promise<T> {
    return this.tracer.startActiveSpan(name, { attributes }, async (span) => {
      try {
        return await fn(span)
      } catch (e) {
        if (e instanceof Error) {
          span.recordException(e)
          span.setStatus({
            code: opentelemetry.SpanStatusCode.ERROR,
            message: e.message,
          })
        }

        throw e
      } finally {
        span.end()
      }
    })
  }
}
