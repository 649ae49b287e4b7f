export {
  processDescriptorSchema,
  createProcessListSchema,
  type ProcessDescriptorInput,
  type ProcessListLimits,
} from './processes'

export {
  algorithmIdSchema,
  createSimulateRequestSchema,
  createCompareRequestSchema,
  createRandomWorkloadSchema,
  type SimulateRequest,
  type CompareRequest,
  type RandomWorkloadRequest,
  type RequestLimits,
} from './simulations'
