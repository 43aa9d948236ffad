/**
 * Service failures raised by transports, shaped like the ones the SDK throws.
 */

import { ErrorResponse } from '@azure/cosmos';
import { v4 as uuidv4 } from 'uuid';

export function serviceError(status: number, code: string, message: string): ErrorResponse {
  const error = new ErrorResponse(message);
  error.code = status;
  error.body = { code, message };
  error.activityId = uuidv4();
  return error;
}

/**
 * The service's answer when the key sent with a write differs from the value
 * at the container's partition key path.
 */
export function partitionKeyMismatch(): ErrorResponse {
  return serviceError(
    400,
    'BadRequest',
    "PartitionKey extracted from document doesn't match the one specified in the header."
  );
}
