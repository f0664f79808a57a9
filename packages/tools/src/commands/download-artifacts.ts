import * as path from 'path';
import { parseArgs } from 'util';
import { resolveArtifactTargets } from '../config/artifact-targets';
import { DEFAULT_ARTIFACTS_DIR, githubApiUrl, loadEnvFiles, resolveRoot } from '../config/config';
import { ArtifactTarget, isRepositoryKind, RepositoryKind, REPOSITORY_KINDS } from '../models/Artifact';
import { ArtifactDownloadService } from '../services/artifact-download.service';
import { ArtifactsApi, GitHubService } from '../services/github.service';
import { TokenService } from '../services/token.service';
import { parseCommandLine, parsePositiveInteger } from '../utils/args';
import { errorMessage, UsageError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const log = createLogger('DownloadArtifacts');

export const DOWNLOAD_USAGE = `Usage: download-artifacts [--repo <${REPOSITORY_KINDS.join('|')}>] [--run-id <id>] [--token <token>] [--output-dir <dir>]

Download CI artifacts from GitHub Actions. By default both pixi and
pixi-build-backends artifacts are fetched.

Options:
  --repo        Restrict the download to a single repository
  --run-id      Workflow run to download from (requires --repo)
  --token       GitHub token (falls back to GITHUB_TOKEN, .env, then 'gh auth token')
  --output-dir  Destination directory (default: ${DEFAULT_ARTIFACTS_DIR})
  -h, --help    Show this message`;

export interface DownloadArtifactsArgs {
  repo?: RepositoryKind;
  runId?: number;
  token?: string;
  outputDir?: string;
  help: boolean;
}

export function parseDownloadArgs(argv: string[]): DownloadArtifactsArgs {
  const { values } = parseCommandLine(() =>
    parseArgs({
      args: argv,
      options: {
        repo: { type: 'string' },
        'run-id': { type: 'string' },
        token: { type: 'string' },
        'output-dir': { type: 'string' },
        help: { type: 'boolean', short: 'h' }
      },
      strict: true,
      allowPositionals: false
    })
  );

  const args: DownloadArtifactsArgs = { help: values.help ?? false };
  if (values.repo !== undefined) {
    if (!isRepositoryKind(values.repo)) {
      throw new UsageError(
        `--repo must be one of ${REPOSITORY_KINDS.join(', ')}, got '${values.repo}'`
      );
    }
    args.repo = values.repo;
  }
  if (values['run-id'] !== undefined) {
    args.runId = parsePositiveInteger(values['run-id'], '--run-id');
  }
  if (values.token !== undefined) {
    args.token = values.token;
  }
  if (values['output-dir'] !== undefined) {
    args.outputDir = values['output-dir'];
  }
  return args;
}

export interface DownloadArtifactsDeps {
  env: NodeJS.ProcessEnv;
  root: string;
  tokenService: TokenService;
  createApi: (token: string, baseUrl: string) => ArtifactsApi;
  createDownloader: (api: ArtifactsApi, outputDir: string) => ArtifactDownloadService;
}

export async function downloadArtifactsCommand(
  argv: string[],
  deps: Partial<DownloadArtifactsDeps> = {}
): Promise<number> {
  const env = deps.env ?? process.env;
  const root = deps.root ?? resolveRoot(env);
  const tokenService = deps.tokenService ?? new TokenService();
  const createApi =
    deps.createApi ?? ((token: string, baseUrl: string): ArtifactsApi => new GitHubService(token, { baseUrl }));
  const createDownloader =
    deps.createDownloader ??
    ((api: ArtifactsApi, outputDir: string) => new ArtifactDownloadService(api, outputDir));

  loadEnvFiles(root, { env });

  let args: DownloadArtifactsArgs;
  try {
    args = parseDownloadArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      log.error(`[ERROR] ${error.message}`);
      console.error(DOWNLOAD_USAGE);
      return 2;
    }
    throw error;
  }
  if (args.help) {
    console.log(DOWNLOAD_USAGE);
    return 0;
  }
  if (args.runId !== undefined && !args.repo) {
    log.error('[ERROR] --run-id can only be used together with --repo');
    return 1;
  }

  let targets: ArtifactTarget[];
  try {
    targets = resolveArtifactTargets(args.repo, env);
  } catch (error) {
    log.error(`[ERROR] ${errorMessage(error)}`);
    return 1;
  }

  const token = await tokenService.resolve({ cliToken: args.token, env });
  if (!token) {
    log.error('[ERROR] No GitHub token provided');
    log.error('  Set GITHUB_TOKEN environment variable, use --token argument, or create a .env file');
    return 1;
  }

  const outputDir = path.resolve(root, args.outputDir ?? DEFAULT_ARTIFACTS_DIR);
  const downloader = createDownloader(createApi(token, githubApiUrl(env)), outputDir);

  let overallSuccess = true;
  for (const target of targets) {
    if (target.prNumber !== undefined) {
      log.warn(`Using PR #${target.prNumber} from ${target.repo}`);
    }
    try {
      const result = await downloader.download(target, { runId: args.runId });
      log.info(`Downloaded ${result.artifact} from run ${result.runId} (${result.files.length} file(s))`);
    } catch (error) {
      overallSuccess = false;
      log.error(`[ERROR] Download failed for ${target.repo}: ${errorMessage(error)}`);
    }
  }

  if (!overallSuccess) {
    return 1;
  }
  log.info('[SUCCESS] Download completed successfully!');
  return 0;
}
