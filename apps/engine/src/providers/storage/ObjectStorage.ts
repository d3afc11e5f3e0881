/**
 * Object Storage Interface
 */

export interface ObjectStorage {
    readonly name: string;

    /**
     * Store bytes under a path hint and return their public URL
     */
    upload(data: Buffer, destination: string, contentType: string): Promise<string>;

    isConfigured(): boolean;
}
