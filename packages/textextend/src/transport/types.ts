import type { ResolvedParameters } from "../core/parameters.js";

/**
 * One text-generation request: the text to extend and the sampling parameters.
 */
export interface InferenceRequest {
  inputs: string;
  params: ResolvedParameters;
}

/**
 * Sends a request to the inference service and resolves to the decoded JSON
 * reply, whatever its shape. Network failures reject.
 *
 * A transport is created once and can be shared by any number of completers.
 */
export type InferenceTransport = (request: InferenceRequest) => Promise<unknown>;
