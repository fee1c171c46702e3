export type ProxyScheme = 'http' | 'https' | 'socks5' | 'socks5h';

export interface ProxyEndpoint {
  scheme: ProxyScheme;
  host: string;
  port: number;
  username?: string;
  password?: string;
  /** Normalised URL, credentials included */
  url: string;
}

export type ProxyMode = 'direct' | 'single' | 'pool';

export type RotationReason = 'preventive' | 'on_error';
