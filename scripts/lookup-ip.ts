import path from "path";
import { loadConfig } from "../src/config/geoip-config";
import { GeoIpLookupService } from "../src/services/geoip-lookup-service";
import { GeoIpError } from "../src/models/errors";

interface LookupArgs {
  help: boolean;
  ipv4?: string;
  ipv6?: string;
  noIpv6: boolean;
  ips: string[];
}

// Parse command line arguments
function parseArgs(argv: string[]): LookupArgs {
  const args: LookupArgs = { help: false, noIpv6: false, ips: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    switch (arg) {
      case "--help":
      case "-h":
        args.help = true;
        break;
      case "--ipv4":
      case "-4":
        args.ipv4 = argv[++i];
        break;
      case "--ipv6":
      case "-6":
        args.ipv6 = argv[++i];
        break;
      case "--no-ipv6":
        args.noIpv6 = true;
        break;
      default:
        args.ips.push(arg);
    }
  }

  return args;
}

// Print usage information
function printUsage(): void {
  console.log("Usage: npm run lookup -- [options] <ip> [<ip> ...]");
  console.log("");
  console.log("Options:");
  console.log("  --ipv4, -4 <file>   Path to GeoLiteCity.dat");
  console.log("  --ipv6, -6 <file>   Path to GeoLiteCityv6.dat");
  console.log("  --no-ipv6           Do not load an IPv6 database");
  console.log("");
  console.log("Example:");
  console.log("  npm run lookup -- -4 vendor/GeoLiteCity.dat 89.16.224.130");
}

// Main function
async function main() {
  const args = parseArgs(process.argv.slice(2));

  if (args.help || args.ips.length === 0) {
    printUsage();
    process.exit(args.help ? 0 : 1);
  }

  const config = loadConfig();
  if (args.ipv4) {
    config.ipv4 = { ...config.ipv4, path: path.resolve(process.cwd(), args.ipv4) };
  }
  if (args.noIpv6) {
    config.ipv6 = null;
  } else if (args.ipv6 && config.ipv6) {
    config.ipv6 = { ...config.ipv6, path: path.resolve(process.cwd(), args.ipv6) };
  }

  const service = await GeoIpLookupService.fromConfig(config);

  let failures = 0;
  for (const ip of args.ips) {
    try {
      const record = service.lookup(ip);
      console.log(JSON.stringify({ ip, record }, null, 2));
    } catch (error) {
      if (!(error instanceof GeoIpError)) throw error;
      failures++;
      console.error(`${ip}: ${error.name}: ${error.message}`);
    }
  }

  process.exit(failures > 0 ? 1 : 0);
}

// Run the script
main().catch((error) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
