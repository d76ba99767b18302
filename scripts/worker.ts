import { describeError } from '@/lib/errors'
import { startWorker } from '@/lib/worker'
import { logDiagnostic } from '@/utils/diagnostics'

startWorker().catch((error: unknown) => {
  logDiagnostic('error', 'worker:fatal', describeError(error))
  process.exitCode = 1
})
