import connectRedis from "./connectRedis";
import connectMySQL from "./connectMySQL";

export { connectRedis, connectMySQL }
