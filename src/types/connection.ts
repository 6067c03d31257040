export type ConnectionState = 'disconnected' | 'connecting' | 'connected';

/** Where the hosting page was served from. A browser `Location` satisfies this. */
export interface PageLocation {
  protocol: string;
  host: string;
}
