/* Error simulator. Test-support seam for exercising the error-propagation path
   end to end; it never touches the classifier or the usage counters. */

import { ErrorSimulationRequest, SimulationAck } from '@flight-delay/dto'
import { SimulatedError } from '@flight-delay/reasons'

export const SIMULATION_OK_MESSAGE = 'No se produjo error'

export function simulateError(req: ErrorSimulationRequest): SimulationAck {
  if (req.raise_error) throw new SimulatedError()
  return { status: 'ok', message: SIMULATION_OK_MESSAGE }
}

export default simulateError
