import JSZip from "jszip";

export const MAIN_PORTRAIT_FILENAME = "portrait_main.jpg";
export const ARCHIVE_FILENAME = "portraits.zip";

// Fixed entry timestamp so identical crops produce identical archives.
const ENTRY_DATE = new Date(Date.UTC(2000, 0, 1));

export function portraitFileName(index: number): string {
  return `portrait_${index}.jpg`;
}

/**
 * Bundle encoded portraits into a DEFLATE ZIP as portrait_0.jpg,
 * portrait_1.jpg, ... in the order given.
 */
export async function buildPortraitArchive(
  jpegs: readonly Uint8Array[],
): Promise<Buffer> {
  const zip = new JSZip();
  jpegs.forEach((jpeg, index) => {
    zip.file(portraitFileName(index), jpeg, { date: ENTRY_DATE });
  });

  return await zip.generateAsync({
    type: "nodebuffer",
    compression: "DEFLATE",
    compressionOptions: { level: 6 },
  });
}
