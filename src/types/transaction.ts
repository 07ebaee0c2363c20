/** A plain (top-level) transaction sent or received by the subject address. */
export interface AddressTransaction {
  hash: string;
  timestamp: number;
  to: string;
  method: string;
  contractName: string;
  value: number; // native units
}

export interface InternalTransaction {
  txHash: string;
  timestamp: number;
  type: string;
  from: string;
  to: string;
  value: number;
}
