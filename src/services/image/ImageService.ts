import { Service } from 'typedi';
import { imageSize } from 'image-size';
import { decode as decodeJpeg } from 'jpeg-js';
import { PNG } from 'pngjs';
import { DecodedImage, ImageFormat, ImageSummary } from '../../types/session';
import { DecodeError, EntryNotFoundError, formatError } from '../../utils/errors';
import { SessionStore } from '../session/SessionStore';
import { summarizeImage } from '../session/SessionState';

const DATA_URL_PATTERN = /^data:(image\/[a-z0-9.+-]+);base64,(.*)$/is;

// image-size reports JPEG as "jpg"
const SUPPORTED_FORMATS: Record<string, ImageFormat> = {
    jpg: 'jpeg',
    png: 'png',
};

/**
 * Uploaded images live only in session memory; nothing here touches the disk.
 */
@Service()
export class ImageService {
    constructor(private readonly sessionStore: SessionStore) { }

    upload(sessionId: string, dataUrl: string): ImageSummary {
        const session = this.sessionStore.get(sessionId);

        let image: DecodedImage;
        try {
            image = this.decode(parseDataUrl(dataUrl));
        } catch (error) {
            session.setImage(undefined);
            throw error;
        }

        session.setImage(image);
        session.recordFirstUpload();
        console.log(`[ImageService] Session ${sessionId} loaded ${image.format} ${image.width}x${image.height}`);
        return summarizeImage(image);
    }

    preview(sessionId: string): DecodedImage {
        const image = this.sessionStore.get(sessionId).currentImage;
        if (!image) {
            throw new EntryNotFoundError('No image uploaded for this session');
        }
        return image;
    }

    decode(bytes: Buffer): DecodedImage {
        if (bytes.byteLength === 0) {
            throw new DecodeError();
        }

        const detected = sniff(bytes);
        const format = detected.type ? SUPPORTED_FORMATS[detected.type] : undefined;
        if (!format || !detected.width || !detected.height) {
            throw new DecodeError();
        }

        // A valid header is not enough; the pixel data has to decode too.
        const { width, height } = decodePixels(format, bytes);

        return {
            format,
            mediaType: format === 'png' ? 'image/png' : 'image/jpeg',
            width,
            height,
            data: bytes,
        };
    }
}

interface SniffedImage {
    type?: string;
    width?: number;
    height?: number;
}

function sniff(bytes: Buffer): SniffedImage {
    try {
        return imageSize(bytes);
    } catch (error) {
        throw new DecodeError(`Could not decode image. Upload a valid JPG/PNG. (${formatError(error)})`);
    }
}

export function parseDataUrl(dataUrl: string): Buffer {
    const match = DATA_URL_PATTERN.exec(dataUrl.trim());
    if (!match) {
        throw new DecodeError('Expected a base64 image data URL.');
    }
    return Buffer.from(match[2], 'base64');
}

function decodePixels(format: ImageFormat, bytes: Buffer): { width: number; height: number } {
    try {
        return format === 'png' ? PNG.sync.read(bytes) : decodeJpeg(bytes, { useTArray: true });
    } catch (error) {
        throw new DecodeError(`Could not decode image. Upload a valid JPG/PNG. (${formatError(error)})`);
    }
}
