import { Request, Response } from 'express'
import { ServiceInfo } from '@flight-delay/dto'
import { CONSTANTS } from '../config'

export function getInfo(_req: Request, res: Response) {
  const info: ServiceInfo = {
    service: CONSTANTS.SERVICE_NAME,
    description: CONSTANTS.DESCRIPTION,
    version: CONSTANTS.VERSION,
    features: [...CONSTANTS.FEATURES]
  }
  res.status(200).json(info)
}

export function getHealth(_req: Request, res: Response) {
  res.status(200).json({ status: 'healthy' })
}

export default getInfo
