/**
 * FFmpeg Command Builder
 *
 * Fluent API for assembling one ffmpeg argument vector. Arguments come out
 * in a fixed order regardless of call order:
 *
 *   overwrite · inputs · trim · filter · maps · audio filter / -an ·
 *   codecs (or -c copy) · container flags · metadata · output
 *
 * The binary itself is not part of the vector.
 */

export interface InputOptions {
  format?: string;        // -f format (e.g. concat)
  extraArgs?: string[];   // Additional input args
}

export interface OutputOptions {
  movflags?: string;      // -movflags for mp4-family containers
  extraArgs?: string[];   // Additional output args
}

export interface VideoCodecOptions {
  codec: string;
  preset?: string;
  qualityArgs?: string[];
  pixFmt?: string;
}

export interface AudioCodecOptions {
  codec: string;
  bitrate?: string;
}

export type FilterArgument =
  | { flag: '-vf'; value: string }
  | { flag: '-filter_complex'; value: string };

export interface MetadataEntry {
  key: string;
  value: string;
}

export class FFmpegCommandBuilder {
  private overwrite = false;
  private inputs: { file: string; options: InputOptions }[] = [];
  private trimArgs: string[] = [];
  private filter: FilterArgument | null = null;
  private mappings: string[] = [];
  private audioFilters: string[] = [];
  private audioDisabled = false;
  private copyAll = false;
  private videoCodec: VideoCodecOptions | null = null;
  private audioCodec: AudioCodecOptions | null = null;
  private mapMetadata: number | null = null;
  private metadata: MetadataEntry[] = [];
  private outputOpts: OutputOptions = {};
  private outputFile = '';

  /**
   * `-y` when true, `-n` (never clobber) otherwise
   */
  setOverwrite(overwrite: boolean): this {
    this.overwrite = overwrite;
    return this;
  }

  addInput(file: string, options: InputOptions = {}): this {
    this.inputs.push({ file, options });
    return this;
  }

  /**
   * Output-side trim (`-ss` / `-to`), placed right after the inputs
   */
  addTrimArgs(...args: string[]): this {
    this.trimArgs.push(...args);
    return this;
  }

  /**
   * Simple chain (`-vf`). Replaces any previously set filter.
   */
  setVideoFilter(chain: string): this {
    this.filter = { flag: '-vf', value: chain };
    return this;
  }

  /**
   * Labeled graph (`-filter_complex`). Replaces any previously set filter.
   */
  setComplexFilter(graph: string): this {
    this.filter = { flag: '-filter_complex', value: graph };
    return this;
  }

  /**
   * Map a stream specifier or a filter-graph output label
   */
  map(spec: string): this {
    this.mappings.push(spec);
    return this;
  }

  addAudioFilter(filter: string): this {
    this.audioFilters.push(filter);
    return this;
  }

  disableAudio(): this {
    this.audioDisabled = true;
    return this;
  }

  /**
   * Copy every stream without re-encoding (`-c copy`)
   */
  streamCopy(): this {
    this.copyAll = true;
    return this;
  }

  setVideoCodec(options: VideoCodecOptions): this {
    this.videoCodec = options;
    return this;
  }

  setAudioCodec(options: AudioCodecOptions): this {
    this.audioCodec = options;
    return this;
  }

  /**
   * `-map_metadata <index>`; -1 strips all global metadata
   */
  setMetadataSource(inputIndex: number): this {
    this.mapMetadata = inputIndex;
    return this;
  }

  addMetadata(key: string, value: string): this {
    this.metadata.push({ key, value });
    return this;
  }

  setOutputOptions(options: OutputOptions): this {
    this.outputOpts = { ...this.outputOpts, ...options };
    return this;
  }

  setOutput(file: string): this {
    this.outputFile = file;
    return this;
  }

  /**
   * Build the command arguments array
   */
  build(): string[] {
    const args: string[] = [this.overwrite ? '-y' : '-n'];

    if (this.inputs.length === 0) {
      throw new Error('No input specified');
    }
    for (const input of this.inputs) {
      if (input.options.format) {
        args.push('-f', input.options.format);
      }
      if (input.options.extraArgs) {
        args.push(...input.options.extraArgs);
      }
      args.push('-i', input.file);
    }

    args.push(...this.trimArgs);

    if (this.filter) {
      args.push(this.filter.flag, this.filter.value);
    }

    for (const mapping of this.mappings) {
      args.push('-map', mapping);
    }

    if (this.audioDisabled) {
      args.push('-an');
    } else if (this.audioFilters.length > 0) {
      args.push('-filter:a', this.audioFilters.join(','));
    }

    if (this.copyAll) {
      args.push('-c', 'copy');
    } else {
      if (this.videoCodec) {
        args.push('-c:v', this.videoCodec.codec);
        if (this.videoCodec.preset) args.push('-preset', this.videoCodec.preset);
        if (this.videoCodec.qualityArgs) args.push(...this.videoCodec.qualityArgs);
        if (this.videoCodec.pixFmt) args.push('-pix_fmt', this.videoCodec.pixFmt);
      }
      if (this.audioCodec && !this.audioDisabled) {
        args.push('-c:a', this.audioCodec.codec);
        if (this.audioCodec.bitrate) args.push('-b:a', this.audioCodec.bitrate);
      }
    }

    if (this.outputOpts.movflags) {
      args.push('-movflags', this.outputOpts.movflags);
    }
    if (this.outputOpts.extraArgs) {
      args.push(...this.outputOpts.extraArgs);
    }

    if (this.mapMetadata !== null) {
      args.push('-map_metadata', this.mapMetadata.toString());
    }
    for (const meta of this.metadata) {
      args.push('-metadata', `${meta.key}=${meta.value}`);
    }

    if (!this.outputFile) {
      throw new Error('Output file not specified');
    }
    args.push(this.outputFile);

    return args;
  }
}
