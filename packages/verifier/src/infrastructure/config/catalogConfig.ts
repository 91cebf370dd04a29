export interface CatalogConfig {
  /** NextPVR サーバーのベースURL（末尾スラッシュなし） */
  baseUrl: string;
  pin: string;
  deviceName: string;
}

/**
 * 環境変数から録画カタログ（NextPVR）の接続設定を取得
 */
export function getCatalogConfig(): CatalogConfig {
  const baseUrl = process.env.NEXTPVR_URL;
  if (!baseUrl) {
    throw new Error('NEXTPVR_URL environment variable is not set');
  }

  return {
    baseUrl: baseUrl.replace(/\/+$/, ''),
    pin: process.env.NEXTPVR_PIN || '0000',
    deviceName: process.env.NEXTPVR_DEVICE_NAME || 'pvrcheck',
  };
}
