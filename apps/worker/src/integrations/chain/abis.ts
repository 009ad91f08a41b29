/**
 * Contract ABIs for the jobs manager
 * Only includes the functions needed by the claim process
 */

export const jobsManagerAbi = [
  // View functions
  {
    name: "getJob",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "jobId", type: "uint256" }],
    outputs: [
      { name: "streamId", type: "string" },
      { name: "transcodingOptions", type: "string" },
      { name: "maxPricePerSegment", type: "uint256" },
      { name: "broadcasterAddress", type: "address" },
      { name: "transcoderAddress", type: "address" },
      { name: "creationRound", type: "uint256" },
      { name: "creationBlock", type: "uint256" },
      { name: "endBlock", type: "uint256" },
    ],
  },
  {
    name: "getClaim",
    type: "function",
    stateMutability: "view",
    inputs: [
      { name: "jobId", type: "uint256" },
      { name: "claimId", type: "uint256" },
    ],
    outputs: [
      { name: "segmentRange", type: "uint256[2]" },
      { name: "claimRoot", type: "bytes32" },
      { name: "claimBlock", type: "uint256" },
      { name: "endVerificationBlock", type: "uint256" },
      { name: "endVerificationSlashingBlock", type: "uint256" },
      { name: "status", type: "uint8" },
    ],
  },
  {
    name: "broadcasters",
    type: "function",
    stateMutability: "view",
    inputs: [{ name: "broadcaster", type: "address" }],
    outputs: [
      { name: "deposit", type: "uint256" },
      { name: "withdrawBlock", type: "uint256" },
    ],
  },
  {
    name: "verificationRate",
    type: "function",
    stateMutability: "view",
    inputs: [],
    outputs: [{ type: "uint64" }],
  },
  {
    name: "verificationPeriod",
    type: "function",
    stateMutability: "view",
    inputs: [],
    outputs: [{ type: "uint64" }],
  },
  {
    name: "verificationSlashingPeriod",
    type: "function",
    stateMutability: "view",
    inputs: [],
    outputs: [{ type: "uint64" }],
  },
  // Write functions
  {
    name: "claimWork",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "jobId", type: "uint256" },
      { name: "segmentRange", type: "uint256[2]" },
      { name: "claimRoot", type: "bytes32" },
    ],
    outputs: [],
  },
  {
    name: "verify",
    type: "function",
    stateMutability: "payable",
    inputs: [
      { name: "jobId", type: "uint256" },
      { name: "claimId", type: "uint256" },
      { name: "segmentNumber", type: "uint256" },
      { name: "dataStorageHash", type: "string" },
      { name: "dataHashes", type: "bytes32[2]" },
      { name: "broadcasterSig", type: "bytes" },
      { name: "proof", type: "bytes" },
    ],
    outputs: [],
  },
  {
    name: "distributeFees",
    type: "function",
    stateMutability: "nonpayable",
    inputs: [
      { name: "jobId", type: "uint256" },
      { name: "claimId", type: "uint256" },
    ],
    outputs: [],
  },
] as const;
