// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace SceneNetServerErrors {
  export const PATCH_NOT_SUPPORTED_ERROR_TYPE = "PATCH_NOT_SUPPORTED";
  export const COMPONENT_DISPOSED_ERROR_TYPE = "COMPONENT_DISPOSED";
  export const ENCODE_FAILURE_ERROR_TYPE = "ENCODE_FAILURE";
  export const INVALID_MESSAGE_ERROR_TYPE = "INVALID_MESSAGE";
  export const INVOKE_FAILED_ERROR_TYPE = "INVOKE_FAILED";
}

export type SceneNetServerErrorType =
  | typeof SceneNetServerErrors.PATCH_NOT_SUPPORTED_ERROR_TYPE
  | typeof SceneNetServerErrors.COMPONENT_DISPOSED_ERROR_TYPE
  | typeof SceneNetServerErrors.ENCODE_FAILURE_ERROR_TYPE
  | typeof SceneNetServerErrors.INVALID_MESSAGE_ERROR_TYPE
  | typeof SceneNetServerErrors.INVOKE_FAILED_ERROR_TYPE;

export class SceneNetServerError extends Error {
  constructor(
    public errorType: SceneNetServerErrorType,
    message: string,
  ) {
    super(message);
    this.name = "SceneNetServerError";
  }
}
