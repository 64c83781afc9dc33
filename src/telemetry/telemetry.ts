import {trace} from '@opentelemetry/api';

/** Name of the span event added for every raised assertion failure. */
export const FAILURE_EVENT = 'assertion.failure';

/**
 * Records an assertion failure on the active span.
 *
 * This is a no-op outside of a span or when the span is not recording,
 * which is the case when no OpenTelemetry SDK is initialized.
 */
export function recordFailure(message: string): void {
  const span = trace.getActiveSpan();

  if (!span || !span.isRecording()) {
    return;
  }

  span.addEvent(FAILURE_EVENT, {message});
}
