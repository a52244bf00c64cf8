// Export formats the Commons storage accepts from the host
export const SUPPORTED_EXTENSIONS = ['jpg', 'png', 'tif', 'webp'] as const;

export interface FormatInfo {
  extension: string;
  isSupported: boolean;
}

export class FormatDetectionService {
  /**
   * Detect the format of an exported file from its name
   */
  detectFormat(fileName: string): FormatInfo {
    const extension = this.getExtension(fileName);
    return {
      extension,
      isSupported: this.isSupported(extension),
    };
  }

  /**
   * Check if the host may offer this export format to the storage
   */
  isSupported(extension: string): boolean {
    return SUPPORTED_EXTENSIONS.some((supported) => supported === extension.toLowerCase());
  }

  /**
   * Get file extension from filename
   */
  getExtension(fileName: string): string {
    const base = fileName.split(/[\\/]/).pop() || '';
    const parts = base.toLowerCase().split('.');
    return parts.length > 1 ? parts[parts.length - 1] : '';
  }
}

export const formatDetectionService = new FormatDetectionService();
