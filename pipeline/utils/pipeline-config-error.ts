/** Invalid options or missing inputs, detected before any page is fetched. */
export class PipelineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PipelineConfigError";
  }
}
