import { Config } from '../configurations';
import { Logger } from '../logging/Logger';
import { Attribute, Connection, SdpParseError, parseAttribute } from '../sdp';

export interface LineFailure {
  line: number;
  text: string;
  error: SdpParseError;
}

export interface DecodedLines {
  attributes: Attribute[];
  connections: Connection[];
  failures: LineFailure[];
}

/**
 * Decodes the `a=` and `c=` lines of a session description, in order.
 * Other line types are ignored. What happens on a malformed line is
 * decided by `SDP_FAILURE_POLICY`.
 */
export class SdpLineDecoder {
  private readonly config: Config;
  private readonly logger: Logger;

  constructor({ config, logger }: { config: Config; logger: Logger }) {
    this.config = config;
    this.logger = logger;
  }

  public decode(lines: readonly string[]): DecodedLines {
    const result: DecodedLines = { attributes: [], connections: [], failures: [] };

    lines.forEach((raw, index) => {
      const text = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
      try {
        if (text.startsWith('a=')) {
          const attribute = parseAttribute(text.slice(2));
          if (attribute.type === 'Other') {
            this.logger.debug(`Unrecognized attribute "${attribute.key}" on line ${index + 1}`);
          }
          result.attributes.push(attribute);
        } else if (text.startsWith('c=')) {
          result.connections.push(Connection.parse(text.slice(2)));
        }
      } catch (err) {
        if (!(err instanceof SdpParseError) || this.config.SDP_FAILURE_POLICY === 'strict') {
          throw err;
        }
        this.logger.warn(`Skipping line ${index + 1}: ${err.message}`, { code: err.code, text });
        result.failures.push({ line: index + 1, text, error: err });
      }
    });

    return result;
  }

  public decodeText(sdp: string): DecodedLines {
    return this.decode(sdp.split('\n'));
  }
}
