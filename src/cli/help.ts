import { FORMAT_VERSIONS } from "../validate/schema";
import { VERSION } from "./version";

/**
 * Help text shown with --help
 */
export function mainHelp(): string {
	const versions = FORMAT_VERSIONS.join(" or ");

	return `apg-verify/${VERSION}

Usage:
  $ apg-verify [archive] [options]

Checks that an APG package archive extracts safely and carries the
required layout and metadata.

Options:
  -a, --apgfile <path>    Path to the APG archive (wins over [archive])
  -f, --format <version>  Metadata format version, ${versions} (default: 1)
  --no-color              Disable colored output
  -v, --version           Display version number
  -h, --help              Display this message

Exit codes:
  0  the archive is a valid APG package
  1  extraction or validation failed
  2  usage error
`;
}
