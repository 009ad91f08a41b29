export { IpfsContentStore } from "./client";
