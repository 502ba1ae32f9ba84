import mongoose from "mongoose"
import type { Logger } from "../logger"

export const connectDb = async (uri: string, log: Logger) => {
    await mongoose.connect(uri)
    log.info("connected to mongodb")
}

export const disconnectDb = async () => {
    await mongoose.disconnect()
}
