import type { ProbeKind } from '@pvrcheck/common-types';

/**
 * ファイル拡張子のヒントからプローバー種別を決める
 *
 * - mp4 / m4v -> mp4
 * - mkv / webm -> mkv
 * - それ以外（ヒントなしを含む）-> ts（PVRサーバーのネイティブ録画はTS）
 */
export function selectProbeKind(fileExtensionHint?: string): ProbeKind {
  const ext = (fileExtensionHint ?? '').trim().toLowerCase().replace(/^\./, '');

  switch (ext) {
    case 'mp4':
    case 'm4v':
      return 'mp4';
    case 'mkv':
    case 'webm':
      return 'mkv';
    default:
      return 'ts';
  }
}

/**
 * ファイル名（パス）から拡張子のヒントを取り出す
 */
export function extensionHintFromFileName(fileName: string | null | undefined): string | undefined {
  if (!fileName) return undefined;
  const baseName = fileName.split(/[\\/]/).pop() ?? '';
  const dot = baseName.lastIndexOf('.');
  if (dot < 0 || dot === baseName.length - 1) return undefined;
  return baseName.slice(dot + 1).toLowerCase();
}
