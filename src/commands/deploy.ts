import { Command } from 'commander'
import * as fs from 'fs/promises'
import * as path from 'path'
import { EthersDeploymentBackend } from '../lib/backend/ethers'
import { loadDeployedContracts } from '../lib/config'
import { TextSink } from '../lib/contracts/cache'
import { deploymentEvents, toVerbosityLevel } from '../lib/events'
import { isValidRpcUrl } from '../lib/network-utils'
import { runDeployment } from '../lib/run'
import {
  dotenvOption,
  loadDotenv,
  parsePositiveInt,
  predeployedOptions,
  setLogToStderr,
  setVerbosity,
  verbosityOption
} from './common'

interface DeployOptions {
  rpcUrl?: string
  privateKey?: string
  mock: boolean
  out?: string
  gasLimit?: number
  dotenv?: string
  verbose: number
  [predeployed: string]: unknown
}

export function makeDeployCommand(): Command {
  const deploy = new Command('deploy')
    .description('Deploy the light client and the libraries it links, skipping anything already deployed')
    .option('--rpc-url <url>', 'JSON-RPC endpoint of the target chain. Can also be set via RPC_URL env var.')
    .option('-k, --private-key <key>', 'Signer private key. Can also be set via PRIVATE_KEY env var. Defaults to the node\'s first account.')
    .option('--mock', 'Deploy LightClientMock and the mock verification key instead of the upgradable LightClient', false)
    .option('-o, --out <path>', 'Write the deployed addresses as a .env file to this path instead of stdout')
    .option('--gas-limit <gas>', 'Fixed gas limit for every transaction', parsePositiveInt)

  predeployedOptions(deploy)
  dotenvOption(deploy)
  verbosityOption(deploy)

  deploy.action(async (options: DeployOptions) => {
    let backend: EthersDeploymentBackend | undefined
    let file: fs.FileHandle | undefined
    let failed = false
    try {
      loadDotenv(options)
      setVerbosity(toVerbosityLevel(options.verbose))
      // stdout carries the .env text unless it goes to a file
      setLogToStderr(!options.out)

      const rpcUrl = options.rpcUrl || process.env.RPC_URL
      if (!rpcUrl) {
        throw new Error('An RPC URL must be provided via the --rpc-url option or the RPC_URL environment variable.')
      }
      if (!isValidRpcUrl(rpcUrl)) {
        throw new Error(`Invalid RPC URL format: ${rpcUrl}`)
      }

      const deployed = loadDeployedContracts(options)

      // Opened before anything is broadcast, so a bad path fails the run up front
      if (options.out) {
        file = await fs.open(path.resolve(options.out), 'w')
      }

      deploymentEvents.emitEvent({
        type: 'deployment_started',
        level: 'info',
        data: {
          rpcUrl,
          variant: options.mock ? 'mock' : 'production',
          predeployed: Object.keys(deployed)
        }
      })

      backend = await EthersDeploymentBackend.fromRpc(rpcUrl, options.privateKey || process.env.PRIVATE_KEY, {
        gasLimit: options.gasLimit
      })
      deploymentEvents.emitEvent({
        type: 'network_signer_info',
        level: 'info',
        data: await backend.getSignerInfo()
      })

      const lines: string[] = []
      const sink: TextSink = file ? { write: (chunk: string) => lines.push(chunk) } : process.stdout
      try {
        await runDeployment({
          backend,
          deployed,
          mock: options.mock,
          sink,
          destination: options.out ?? 'stdout'
        })
      } catch {
        // runDeployment has already reported the failure
        failed = true
      }

      if (file) {
        try {
          await file.writeFile(lines.join(''))
        } catch (error) {
          // Print the addresses so they are not lost
          process.stdout.write(lines.join(''))
          throw error
        }
      }
    } catch (error) {
      deploymentEvents.emitEvent({
        type: 'cli_error',
        level: 'error',
        data: {
          message: error instanceof Error ? error.message : String(error)
        }
      })
      failed = true
    } finally {
      await file?.close()
      await backend?.dispose()
    }

    if (failed) {
      process.exit(1)
    }
  })

  return deploy
}
