import type { TransactionStatus } from "../robot/types.js";

/** A server order as declared in the manifest. */
export interface ServerOrderSpec {
  key: string;
  /** Market ("auction") orders take a numeric product id */
  market: boolean;
  productId: string;
  dist?: string;
  location?: string;
  /** Root password; never persisted */
  password?: string;
  authorizedKeys: string[];
  addons: string[];
  test: boolean;
}

export interface ServerOrderState extends Omit<ServerOrderSpec, "password"> {
  transactionId: string;
  status: TransactionStatus;
  serverNumber: number | null;
  serverIP: string | null;
}
