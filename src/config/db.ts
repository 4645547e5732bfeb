// src/config/db.ts
import mongoose from "mongoose";
import config from "./config";

const connectDB = async (uri: string = config.databaseURI): Promise<void> => {
  try {
    await mongoose.connect(uri);
    console.log("✅ MongoDB connected");

    // Unique indexes (one submission per student per assignment) must exist
    // before the first write races another.
    await mongoose.syncIndexes();
  } catch (error) {
    console.error("❌ MongoDB connection error:", error);
    process.exit(1);
  }
};

export default connectDB;
