// src/config/db.ts
import mongoose from "mongoose";
import dotenv from "dotenv";
dotenv.config();

const MONGO_URI = process.env.MONGO_URI ?? "mongodb://localhost:27017/watch-tracker";

export async function connectDB(): Promise<void> {
  mongoose.connection.on("error", (err) => console.error("❌ MongoDB Error:", err));
  mongoose.connection.on("disconnected", () => console.warn("⚠️ MongoDB disconnected"));

  await mongoose.connect(MONGO_URI);
  console.log("✅ MongoDB connected");
}

export async function disconnectDB(): Promise<void> {
  await mongoose.disconnect();
  console.log("🛑 MongoDB connection closed");
}
