/**
 * # Helper-tools for JsonRPC API organization
 */
export namespace JsonRpc {
  export interface SuccessfulResponse<T> {
    readonly status: 'ok';
    readonly payload: T;
  }

  export interface FailedResponse {
    readonly status: 'error';
    readonly message: string;
    readonly code: string;
    readonly payload?: unknown;
  }

  export type Response<T> = SuccessfulResponse<T> | FailedResponse;
}
