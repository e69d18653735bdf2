import { OnlineSearchHit } from "../../domain/types.js";

export interface OnlineSearchGateway {
  search(query: string, maxResults: number, signal?: AbortSignal): Promise<OnlineSearchHit[]>;
}
