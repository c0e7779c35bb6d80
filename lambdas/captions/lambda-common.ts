import { Logger } from '@aws-lambda-powertools/logger'
import { injectLambdaContext } from '@aws-lambda-powertools/logger/middleware'
import { Metrics } from '@aws-lambda-powertools/metrics'
import { logMetrics } from '@aws-lambda-powertools/metrics/middleware'
import middy from '@middy/core'
import type { Context } from 'aws-lambda'

// Exported powertools instances for use anywhere within a Lambda function implementation
export const logger = new Logger()
export const metrics = new Metrics()

/**
 * Create a wrapped Lambda Function handler with injected powertools logger and metrics
 *
 * @param handler The undecorated Lambda Function handler
 * @returns A 'middified' handler
 */
export const middify = <TEvent, TResult>(
  handler: (event: TEvent, context: Context) => Promise<TResult>,
) => {
  return middy<TEvent, TResult>(handler)
    .use(injectLambdaContext(logger, { logEvent: true }))
    .use(logMetrics(metrics))
}
