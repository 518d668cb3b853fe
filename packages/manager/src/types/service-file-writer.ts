/**
 * Writes a service definition into a protected system directory.
 */
export interface ServiceFileWriter {
	/**
	 * Write `content` to `directory/fileName`, holding write access to the
	 * directory only for the duration of the write.
	 * @returns The path of the written file.
	 */
	write(directory: string, fileName: string, content: string): Promise<string>;
}
