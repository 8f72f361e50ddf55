// src/server.ts
import { createApp } from "./app";
import connectDB from "./config/db";
import config from "./config/config";
import { createSessionStore } from "./services/sessionStore";

const startServer = async () => {
  try {
    if (config.sessionStore === "mongo") {
      await connectDB();
    } else {
      console.log("ℹ️ Using in-memory session store; uploads are lost on restart");
    }

    const store = createSessionStore(config.sessionStore, config.sessionTtlHours);
    const app = createApp({ store });

    app.listen(config.port, () => {
      console.log(`Server running on http://localhost:${config.port}`);
      console.log(`Frontend: ${config.frontendUrl}`);
      console.log(`Pass threshold: ${config.passThreshold}`);
      console.log(`Environment: ${process.env.NODE_ENV || "development"}`);
    });
  } catch (error) {
    console.error("Failed to start server:", error);
    process.exit(1);
  }
};

void startServer();
