/**
 * On-chain redemption of winning outcome tokens (Conditional Tokens on Polygon)
 *
 * Three account layouts:
 *   - EOA:               redeemPositions sent straight to the CTF contract
 *   - Polymarket proxy:  wrapped in ProxyWalletFactory.proxy([call])
 *   - Gnosis Safe:       signed by the owner and run through Safe.execTransaction
 */

import { ethers } from 'ethers';
import type { RedeemResult, SettlementGateway } from '../types/venue';
import type { Secrets } from '../config/config';
import { classifyOutcome } from './discovery';
import { errorMessage } from '../types/errors';
import { Logger, logger as rootLogger } from '../logger/logger';
import {
  CTF_ADDRESS,
  PROXY_REDEEM_GAS_LIMIT,
  PROXY_WALLET_FACTORY_ADDRESS,
  REDEEM_GAS_LIMIT,
  SAFE_TX_GAS,
  USDC_ADDRESS,
} from '../config/constants';

const CTF_ABI = [
  'function redeemPositions(address collateralToken, bytes32 parentCollectionId, bytes32 conditionId, uint256[] indexSets)',
  'event PayoutRedemption(address indexed redeemer, address indexed collateralToken, bytes32 indexed parentCollectionId, bytes32 conditionId, uint256[] indexSets, uint256 payout)',
];

const SAFE_ABI = [
  'function nonce() view returns (uint256)',
  'function getThreshold() view returns (uint256)',
  'function getTransactionHash(address to, uint256 value, bytes data, uint8 operation, uint256 safeTxGas, uint256 baseGas, uint256 gasPrice, address gasToken, address refundReceiver, uint256 _nonce) view returns (bytes32)',
  'function execTransaction(address to, uint256 value, bytes data, uint8 operation, uint256 safeTxGas, uint256 baseGas, uint256 gasPrice, address gasToken, address refundReceiver, bytes signatures) payable returns (bool)',
];

const PROXY_FACTORY_ABI = [
  'function proxy((uint8 typeCode, address to, uint256 value, bytes data)[] calls) payable returns (bytes[])',
];

const ctfInterface = new ethers.utils.Interface(CTF_ABI);
const safeInterface = new ethers.utils.Interface(SAFE_ABI);
const proxyFactoryInterface = new ethers.utils.Interface(PROXY_FACTORY_ABI);

// Proxy factory call type
const PROXY_CALL_TYPE = 1;

/**
 * CTF index set of an outcome: 1 for Up, 2 for Down
 */
export function indexSetFor(outcome: string): number {
  return classifyOutcome(outcome) === 'Up' ? 1 : 2;
}

export function encodeRedeemPositions(conditionId: string, indexSets: number[]): string {
  return ctfInterface.encodeFunctionData('redeemPositions', [
    USDC_ADDRESS,
    ethers.constants.HashZero,
    ethers.utils.hexZeroPad(conditionId, 32),
    indexSets,
  ]);
}

export function encodeProxyRedeem(redeemCalldata: string): string {
  return proxyFactoryInterface.encodeFunctionData('proxy', [
    [{ typeCode: PROXY_CALL_TYPE, to: CTF_ADDRESS, value: 0, data: redeemCalldata }],
  ]);
}

interface RedeemTransaction {
  to: string;
  data: string;
  gasLimit: number;
  viaSafe: boolean;
}

export interface CtfSettlementOptions {
  rpcUrl: string;
  secrets: Secrets;
  log?: Logger;
}

export class CtfSettlementGateway implements SettlementGateway {
  private readonly rpcUrl: string;
  private readonly secrets: Secrets;
  private readonly log: Logger;
  private wallet: ethers.Wallet | null = null;

  constructor(options: CtfSettlementOptions) {
    this.rpcUrl = options.rpcUrl;
    this.secrets = options.secrets;
    this.log = options.log ?? rootLogger.child('redeem');
  }

  private getWallet(): ethers.Wallet {
    if (!this.wallet) {
      if (!this.secrets.privateKey) {
        throw new Error('POLYMARKET_PRIVATE_KEY is required for redemption');
      }
      const provider = new ethers.providers.JsonRpcProvider(this.rpcUrl);
      this.wallet = new ethers.Wallet(this.secrets.privateKey, provider);
    }
    return this.wallet;
  }

  /**
   * Redeem the winning side of a resolved market. Never throws; a failed or
   * reverted transaction comes back as success=false.
   */
  async redeem(conditionId: string, outcome: string): Promise<RedeemResult> {
    try {
      const wallet = this.getWallet();
      const tx = await this.buildTransaction(wallet, conditionId, outcome);

      const response = await wallet.sendTransaction({ to: tx.to, data: tx.data, gasLimit: tx.gasLimit, value: 0 });
      this.log.info(`📤 Redeem tx sent: ${response.hash}`);

      let receipt: ethers.providers.TransactionReceipt;
      try {
        receipt = await response.wait();
      } catch (error) {
        return { success: false, tx_hash: response.hash, message: `Redemption transaction failed: ${errorMessage(error)}` };
      }

      if (receipt.status !== 1) {
        return { success: false, tx_hash: response.hash, message: 'Redemption transaction reverted' };
      }

      // The Safe's outer call can succeed while the inner redeem reverts
      if (tx.viaSafe && !hasPayoutRedemption(receipt)) {
        return {
          success: false,
          tx_hash: response.hash,
          message: 'Inner redeem reverted (no PayoutRedemption from CTF); check the Safe holds the winning tokens',
        };
      }

      this.log.info(`✅ Redeemed ${conditionId.slice(0, 10)}... (${outcome}) in block ${receipt.blockNumber}`);
      return { success: true, tx_hash: response.hash, message: `Redeemed in tx ${response.hash}` };
    } catch (error) {
      return { success: false, message: errorMessage(error) };
    }
  }

  private async buildTransaction(wallet: ethers.Wallet, conditionId: string, outcome: string): Promise<RedeemTransaction> {
    const proxy = this.secrets.proxyWallet;
    const signatureType = this.secrets.signatureType;

    if (proxy && signatureType === 2) {
      // The Safe redeems both index sets in one call
      const redeemData = encodeRedeemPositions(conditionId, [1, 2]);
      this.log.info(`Redeeming ${conditionId.slice(0, 10)}... via Safe ${proxy}`);
      const data = await this.buildSafeExecution(wallet, proxy, redeemData);
      return { to: proxy, data, gasLimit: PROXY_REDEEM_GAS_LIMIT, viaSafe: true };
    }

    const redeemData = encodeRedeemPositions(conditionId, [indexSetFor(outcome)]);

    if (proxy && signatureType === 1) {
      this.log.info(`Redeeming ${conditionId.slice(0, 10)}... via proxy wallet factory`);
      return {
        to: PROXY_WALLET_FACTORY_ADDRESS,
        data: encodeProxyRedeem(redeemData),
        gasLimit: PROXY_REDEEM_GAS_LIMIT,
        viaSafe: false,
      };
    }

    this.log.info(`Redeeming ${conditionId.slice(0, 10)}... from EOA ${wallet.address}`);
    return { to: CTF_ADDRESS, data: redeemData, gasLimit: REDEEM_GAS_LIMIT, viaSafe: false };
  }

  private async readSafe(wallet: ethers.Wallet, safe: string, method: string, args: unknown[] = []): Promise<ethers.utils.Result> {
    const data = safeInterface.encodeFunctionData(method, args);
    const raw = await wallet.provider.call({ to: safe, data });
    return safeInterface.decodeFunctionResult(method, raw);
  }

  /**
   * execTransaction calldata for a single-owner-signed CTF call
   */
  private async buildSafeExecution(wallet: ethers.Wallet, safe: string, redeemData: string): Promise<string> {
    const zero = ethers.constants.AddressZero;

    const nonce = ethers.BigNumber.from((await this.readSafe(wallet, safe, 'nonce'))[0]);
    const txHash = ethers.utils.hexlify((await this.readSafe(wallet, safe, 'getTransactionHash', [
      CTF_ADDRESS, 0, redeemData, 0, SAFE_TX_GAS, 0, 0, zero, zero, nonce,
    ]))[0]);

    // eth_sign style signature; Safe expects v + 4 for those
    const signature = ethers.utils.splitSignature(await wallet.signMessage(ethers.utils.arrayify(txHash)));
    let packed = ethers.utils.hexConcat([signature.r, signature.s, [signature.v + 4]]);

    const threshold = ethers.BigNumber.from((await this.readSafe(wallet, safe, 'getThreshold'))[0]);
    if (threshold.gt(1)) {
      packed = ethers.utils.hexConcat([wallet.address, packed]);
    }

    return safeInterface.encodeFunctionData('execTransaction', [
      CTF_ADDRESS, 0, redeemData, 0, SAFE_TX_GAS, 0, 0, zero, zero, packed,
    ]);
  }
}

function hasPayoutRedemption(receipt: ethers.providers.TransactionReceipt): boolean {
  const topic = ctfInterface.getEventTopic('PayoutRedemption');
  return receipt.logs.some(
    log => log.address.toLowerCase() === CTF_ADDRESS.toLowerCase() && log.topics[0] === topic,
  );
}
