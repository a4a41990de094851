import sharp from 'sharp';

// Decodes the upload, applies EXIF rotation and converts to grayscale PNG for OCR.
// Undecodable input is passed through as-is.
export async function prepareImageForOcr(input: Buffer): Promise<Buffer> {
    if (input.length === 0) {
        return input;
    }
    try {
        return await sharp(input).rotate().grayscale().png().toBuffer();
    } catch (error) {
        console.warn('Image preparation failed, sending original bytes to OCR:', error instanceof Error ? error.message : error);
        return input;
    }
}
